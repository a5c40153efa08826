import { randomUUID } from 'crypto';
import { TradingApi, TradingApiClient } from '../api/TradingApiClient';
import type { ConnectionEvents } from '../bus/WsBusClient';
import { WsBusClient } from '../bus/WsBusClient';
import type { BusClient } from '../bus/types';
import type { AppConfig } from '../config/config';
import { CoordinatorStatus, OrderEntryCoordinator } from '../coordinator/OrderEntryCoordinator';
import { TransientIOError, ValidationError, errorMessage } from '../errors/OrderEntryError';
import type { PendingIntentStore } from '../orders/PendingIntentStore';
import { Logger, logger as defaultLogger } from '../utils/logger';

/** Bus transport for one session: the client plus its connection-state feed. */
export interface SessionTransport {
  bus: BusClient;
  events?: ConnectionEvents;
  connect(): Promise<void>;
  close(): void;
}

export type SessionTransportFactory = (userId: string) => SessionTransport;
export type TradingApiFactory = (userId: string) => TradingApi;

export interface SessionServiceDeps {
  config: Pick<
    AppConfig,
    | 'staleness'
    | 'safetyTimeoutsMs'
    | 'confirmFetchTimeoutMs'
    | 'refreshIntervalsMs'
    | 'subscriptionRetry'
    | 'maxSessions'
  >;
  intentStore: PendingIntentStore;
  transportFactory: SessionTransportFactory;
  apiFactory: TradingApiFactory;
  generateId?: () => string;
  log?: Logger;
}

interface SessionEntry {
  id: string;
  userId: string;
  createdAt: Date;
  coordinator: OrderEntryCoordinator;
  transport: SessionTransport;
}

export interface SessionSummary {
  sessionId: string;
  userId: string;
  createdAt: string;
}

const USER_ID_PATTERN = /^[A-Za-z0-9_.:-]{1,64}$/;

export function wsTransportFactory(config: Pick<AppConfig, 'bus' | 'tradingApi'>, log: Logger = defaultLogger): SessionTransportFactory {
  return (userId) => {
    const client = new WsBusClient({
      url: config.bus.url,
      apiKey: config.tradingApi.apiKey,
      userId,
      ackTimeoutMs: config.bus.ackTimeoutMs,
      reconnectMinMs: config.bus.reconnectMinMs,
      reconnectMaxMs: config.bus.reconnectMaxMs,
      log,
    });
    return {
      bus: client,
      events: client,
      connect: () => client.connect(),
      close: () => client.close(),
    };
  };
}

export function restApiFactory(config: Pick<AppConfig, 'tradingApi'>, log: Logger = defaultLogger): TradingApiFactory {
  return (userId) =>
    new TradingApiClient({
      baseUrl: config.tradingApi.baseUrl,
      apiKey: config.tradingApi.apiKey,
      timeoutMs: config.tradingApi.timeoutMs,
      userId,
      log,
    });
}

/**
 * Registry of order-entry sessions. Each session gets its own bus transport,
 * REST client and coordinator; the session ID keys the persisted intent.
 */
export class SessionService {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly log: Logger;
  private readonly generateId: () => string;

  constructor(private readonly deps: SessionServiceDeps) {
    this.log = deps.log ?? defaultLogger;
    this.generateId = deps.generateId ?? randomUUID;
  }

  /**
   * Opens a session. `sessionId` may be passed to resume one whose pending
   * intent was persisted before a restart.
   */
  async create(input: { userId: unknown; sessionId?: unknown }): Promise<OrderEntryCoordinator> {
    const userId = typeof input.userId === 'string' ? input.userId.trim() : '';
    if (!USER_ID_PATTERN.test(userId)) {
      throw new ValidationError('invalid_user_id', 'userId must be 1-64 characters of [A-Za-z0-9_.:-]');
    }
    let sessionId: string;
    if (input.sessionId === undefined || input.sessionId === null || input.sessionId === '') {
      sessionId = this.generateId();
    } else if (typeof input.sessionId === 'string' && USER_ID_PATTERN.test(input.sessionId)) {
      sessionId = input.sessionId;
    } else {
      throw new ValidationError('invalid_session_id', 'sessionId must be 1-64 characters of [A-Za-z0-9_.:-]');
    }

    if (this.sessions.has(sessionId)) {
      throw new ValidationError('session_exists', `Session ${sessionId} is already open`);
    }
    if (this.sessions.size >= this.deps.config.maxSessions) {
      throw new TransientIOError('session_limit', `Session limit reached (${this.deps.config.maxSessions})`);
    }

    const transport = this.deps.transportFactory(userId);
    const { config } = this.deps;
    const coordinator = new OrderEntryCoordinator({
      sessionId,
      userId,
      bus: transport.bus,
      connectionEvents: transport.events,
      api: this.deps.apiFactory(userId),
      intentStore: this.deps.intentStore,
      staleness: config.staleness,
      safetyTimeoutsMs: config.safetyTimeoutsMs,
      confirmFetchTimeoutMs: config.confirmFetchTimeoutMs,
      refreshIntervalsMs: config.refreshIntervalsMs,
      subscriptionRetry: config.subscriptionRetry,
      log: this.log,
    });
    const entry: SessionEntry = { id: sessionId, userId, createdAt: new Date(), coordinator, transport };
    this.sessions.set(sessionId, entry);

    try {
      await transport.connect();
      await coordinator.initialize();
    } catch (error) {
      this.log.error('SESSION_OPEN_FAILED', { sessionId, userId, error: errorMessage(error) });
      await this.teardown(entry);
      throw error;
    }

    this.log.info('SESSION_OPENED', { sessionId, userId, activeSessions: this.sessions.size });
    return coordinator;
  }

  get(sessionId: string): OrderEntryCoordinator {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new ValidationError('session_not_found', `Unknown session ${sessionId}`);
    }
    return entry.coordinator;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  status(sessionId: string): CoordinatorStatus {
    return this.get(sessionId).status();
  }

  list(): SessionSummary[] {
    return [...this.sessions.values()].map((entry) => ({
      sessionId: entry.id,
      userId: entry.userId,
      createdAt: entry.createdAt.toISOString(),
    }));
  }

  size(): number {
    return this.sessions.size;
  }

  async close(sessionId: string): Promise<boolean> {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return false;
    }
    await this.teardown(entry);
    this.log.info('SESSION_CLOSED', { sessionId, activeSessions: this.sessions.size });
    return true;
  }

  async closeAll(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((id) => this.close(id)));
  }

  private async teardown(entry: SessionEntry): Promise<void> {
    if (this.sessions.get(entry.id) === entry) {
      this.sessions.delete(entry.id);
    }
    try {
      await entry.coordinator.dispose();
    } finally {
      entry.transport.close();
    }
  }
}
