import { WebSocket } from 'ws';
import type { OrderEntryConsumer, OrderEntryCoordinator } from '../coordinator/OrderEntryCoordinator';
import { errorMessage } from '../errors/OrderEntryError';
import { Logger, logger as defaultLogger } from '../utils/logger';

type LifecycleReason = 'close' | 'error' | 'stale' | 'terminated' | 'session_closed';

/** The parts of a `ws` client the manager touches. */
export interface StreamClient {
  readonly readyState: number;
  send(data: string): void;
  ping(): void;
  terminate(): void;
  on(event: 'pong', listener: () => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

type ManagerDeps = {
  log?: Logger;
  heartbeatIntervalMs?: number;
  staleConnectionMs?: number;
  maxClientsPerSession?: number;
  now?: () => number;
};

type ConnectionContext = {
  remoteAddress?: string | null;
};

interface ClientEntry {
  sessionId: string;
  unregister: () => void;
  lastPongAt: number;
}

const DEFAULT_HEARTBEAT_INTERVAL_MS = 15_000;
const DEFAULT_STALE_CONNECTION_MS = 60_000;
const DEFAULT_MAX_CLIENTS_PER_SESSION = 8;

/**
 * Streams one session's consumer events to display clients as JSON frames
 * `{type, sessionId, ts, data}`. Dead clients are found by ping/pong.
 */
export class SessionStreamManager {
  private readonly clients = new Map<StreamClient, ClientEntry>();
  private readonly heartbeatIntervalMs: number;
  private readonly staleConnectionMs: number;
  private readonly maxClientsPerSession: number;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly timer: NodeJS.Timeout;

  constructor(deps: ManagerDeps = {}) {
    this.heartbeatIntervalMs = Math.max(1_000, deps.heartbeatIntervalMs || DEFAULT_HEARTBEAT_INTERVAL_MS);
    this.staleConnectionMs = Math.max(this.heartbeatIntervalMs * 2, deps.staleConnectionMs || DEFAULT_STALE_CONNECTION_MS);
    this.maxClientsPerSession = Math.max(1, deps.maxClientsPerSession || DEFAULT_MAX_CLIENTS_PER_SESSION);
    this.log = deps.log ?? defaultLogger;
    this.now = deps.now ?? Date.now;
    this.timer = setInterval(() => this.heartbeatSweep(), this.heartbeatIntervalMs);
  }

  registerClient(
    client: StreamClient,
    sessionId: string,
    coordinator: OrderEntryCoordinator,
    context: ConnectionContext = {}
  ): boolean {
    if (this.getClientCount(sessionId) >= this.maxClientsPerSession) {
      this.log.warn('WS_CLIENT_REJECTED', { sessionId, reason: 'too_many_clients' });
      client.terminate();
      return false;
    }

    const send = (type: string, data: unknown) => this.send(client, type, sessionId, data);
    const consumer: OrderEntryConsumer = {
      onPriceTick: (tick) => send('price', tick),
      onPositions: (snapshot) => send('positions', snapshot),
      onSafetyState: (state) => send('safety', state),
      onConnectionState: (state, readOnly) => send('connection', { state, readOnly }),
      onSelectionChanged: (symbol) => send('selection', { symbol }),
      onRecentFills: (fills) => send('fills', fills),
      onOrderState: (snapshot) => send('order', snapshot),
    };

    this.clients.set(client, {
      sessionId,
      unregister: coordinator.register(consumer),
      lastPongAt: this.now(),
    });

    client.on('pong', () => {
      const entry = this.clients.get(client);
      if (entry) {
        entry.lastPongAt = this.now();
      }
    });

    client.on('close', (code, reasonBuffer) => {
      this.cleanupClient(client, 'close', {
        code,
        reason: reasonBuffer.toString(),
        remoteAddress: context.remoteAddress || null,
      });
    });

    client.on('error', (error) => {
      this.log.warn('WS_CLIENT_ERROR', {
        error: error.message || 'client_error',
        remoteAddress: context.remoteAddress || null,
      });
      this.cleanupClient(client, 'error', {
        remoteAddress: context.remoteAddress || null,
      });
    });

    this.log.info('WS_CLIENT_JOIN', {
      sessionId,
      remoteAddress: context.remoteAddress || null,
      activeClients: this.clients.size,
    });

    send('status', coordinator.status());
    return true;
  }

  getClientCount(sessionId?: string): number {
    if (sessionId === undefined) {
      return this.clients.size;
    }
    let count = 0;
    for (const entry of this.clients.values()) {
      if (entry.sessionId === sessionId) count++;
    }
    return count;
  }

  /** Disconnects every client of a session that is being closed. */
  closeSession(sessionId: string): number {
    let closed = 0;
    for (const [client, entry] of [...this.clients]) {
      if (entry.sessionId !== sessionId) continue;
      this.terminate(client);
      this.cleanupClient(client, 'session_closed', { sessionId });
      closed++;
    }
    return closed;
  }

  shutdown(): void {
    clearInterval(this.timer);
    for (const client of [...this.clients.keys()]) {
      this.terminate(client);
      this.cleanupClient(client, 'terminated');
    }
  }

  private send(client: StreamClient, type: string, sessionId: string, data: unknown): void {
    if (client.readyState !== WebSocket.OPEN) {
      return;
    }
    try {
      client.send(JSON.stringify({ type, sessionId, ts: new Date(this.now()).toISOString(), data }));
    } catch (error) {
      this.log.warn('WS_CLIENT_SEND_ERROR', { sessionId, type, error: errorMessage(error) });
      this.cleanupClient(client, 'error', { sessionId });
    }
  }

  private heartbeatSweep(): void {
    const now = this.now();

    for (const [client, entry] of [...this.clients]) {
      if (client.readyState === WebSocket.CLOSED) {
        this.cleanupClient(client, 'close');
        continue;
      }
      if (client.readyState !== WebSocket.OPEN) {
        continue;
      }

      if (now - entry.lastPongAt > this.staleConnectionMs) {
        this.log.warn('WS_CLIENT_STALE_CLOSE', {
          sessionId: entry.sessionId,
          staleForMs: now - entry.lastPongAt,
        });
        this.terminate(client);
        this.cleanupClient(client, 'stale');
        continue;
      }

      try {
        client.ping();
      } catch (error) {
        this.log.warn('WS_CLIENT_PING_FAILED', { sessionId: entry.sessionId, error: errorMessage(error) });
        this.cleanupClient(client, 'error');
      }
    }
  }

  private terminate(client: StreamClient): void {
    if (client.readyState !== WebSocket.OPEN && client.readyState !== WebSocket.CONNECTING) {
      return;
    }
    try {
      client.terminate();
    } catch (error) {
      this.log.warn('WS_CLIENT_TERMINATE_FAILED', { error: errorMessage(error) });
    }
  }

  private cleanupClient(client: StreamClient, reason: LifecycleReason, detail: Record<string, unknown> = {}): void {
    const entry = this.clients.get(client);
    if (!entry) {
      return;
    }

    this.clients.delete(client);
    entry.unregister();

    this.log.info('WS_CLIENT_LEAVE', {
      reason,
      sessionId: entry.sessionId,
      activeClients: this.clients.size,
      ...detail,
    });
  }
}
