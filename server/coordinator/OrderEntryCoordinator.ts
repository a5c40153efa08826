import type { TradingApi } from '../api/TradingApiClient';
import {
  PositionsSnapshot,
  PriceTick,
  RecentFills,
  parsePositionsPayload,
  parsePriceTick,
} from '../api/payloads';
import type { ConnectionEvents } from '../bus/WsBusClient';
import {
  BusClient,
  CONNECTION_CHANNEL,
  ConnectionStateName,
  positionsChannel,
  priceChannel,
} from '../bus/types';
import {
  ProgrammingInvariantError,
  SubscriptionCancelledError,
  ValidationError,
  errorMessage,
} from '../errors/OrderEntryError';
import { MarketDataStore } from '../market/MarketDataStore';
import { IntentManager } from '../orders/IntentManager';
import { OrderSubmissionPipeline, PipelineSnapshot } from '../orders/OrderSubmissionPipeline';
import type { PendingIntentStore } from '../orders/PendingIntentStore';
import type { BlockReason } from '../orders/types';
import { SAFETY_CHANNELS, SafetyKind, SafetyState } from '../safety/SafetyState';
import { SafetyFetchPurpose, SafetyStateTracker } from '../safety/SafetyStateTracker';
import { StalenessPolicy, StalenessThresholds } from '../safety/StalenessPolicy';
import {
  ChannelCallback,
  SubscriptionCoordinator,
  SubscriptionRetryOptions,
} from '../subscriptions/SubscriptionCoordinator';
import { Logger, logger as defaultLogger, withContext } from '../utils/logger';
import { isRecord, normalizeSymbol } from '../utils/parse';
import { RefreshLoop } from './RefreshLoop';

export const OWNERS = {
  selectedSymbol: 'selected_symbol',
  watchlist: 'watchlist',
  positions: 'positions',
  killSwitch: 'kill_switch',
  circuitBreaker: 'circuit_breaker',
  connection: 'connection',
} as const;

const KNOWN_CONNECTION_STATES: ReadonlySet<ConnectionStateName> = new Set([
  'CONNECTED',
  'DEGRADED',
  'DISCONNECTED',
  'RECONNECTING',
]);

/** Coming back to CONNECTED from one of these means the bus lost our subscriptions. */
const RESUBSCRIBE_FROM: ReadonlySet<ConnectionStateName> = new Set(['DISCONNECTED', 'RECONNECTING', 'UNKNOWN']);

export interface RefreshIntervals {
  positions: number;
  buyingPower: number;
  riskLimits: number;
}

export const DEFAULT_REFRESH_INTERVALS_MS: RefreshIntervals = {
  positions: 5_000,
  buyingPower: 10_000,
  riskLimits: 240_000,
};

/** Display-side listener. Every callback is optional; a throwing one is logged and skipped. */
export interface OrderEntryConsumer {
  onPriceTick?(tick: PriceTick): void;
  onPositions?(snapshot: PositionsSnapshot): void;
  onSafetyState?(state: SafetyState): void;
  onConnectionState?(state: ConnectionStateName, readOnly: boolean): void;
  onSelectionChanged?(symbol: string | null): void;
  onRecentFills?(fills: RecentFills): void;
  onOrderState?(snapshot: PipelineSnapshot): void;
}

export interface OrderEntryCoordinatorDeps {
  sessionId: string;
  userId: string;
  bus: BusClient;
  api: TradingApi;
  intentStore: PendingIntentStore;
  connectionEvents?: ConnectionEvents;
  staleness?: Partial<StalenessThresholds>;
  refreshIntervalsMs?: Partial<RefreshIntervals>;
  safetyTimeoutsMs?: Partial<Record<SafetyFetchPurpose, number>>;
  subscriptionRetry?: Partial<SubscriptionRetryOptions>;
  confirmFetchTimeoutMs?: number;
  now?: () => Date;
  log?: Logger;
}

export interface SelectionResult {
  symbol: string | null;
  subscribed: boolean;
  superseded: boolean;
}

export interface CoordinatorStatus {
  sessionId: string;
  userId: string;
  initialized: boolean;
  initError: string | null;
  disposed: boolean;
  selectedSymbol: string | null;
  watchlist: string[];
  connection: { state: ConnectionStateName; readOnly: boolean };
  safety: Record<SafetyKind, SafetyState>;
  submission: { allowed: boolean; block: BlockReason | null };
  order: PipelineSnapshot;
  subscriptions: { active: string[]; pending: string[]; failed: string[] };
}

export function parseConnectionState(raw: unknown): ConnectionStateName {
  let value: unknown = raw;
  if (isRecord(raw)) {
    value = raw.state;
  }
  if (typeof value !== 'string') {
    return 'UNKNOWN';
  }
  const normalized = value.trim().toUpperCase();
  for (const state of KNOWN_CONNECTION_STATES) {
    if (state === normalized) {
      return state;
    }
  }
  return 'UNKNOWN';
}

/**
 * One per order-entry session. Sole owner of the session's bus subscriptions,
 * safety state, cached market data and order pipeline; display consumers only
 * ever see data through `register`.
 */
export class OrderEntryCoordinator {
  readonly subscriptions: SubscriptionCoordinator;
  readonly safety: SafetyStateTracker;
  readonly market = new MarketDataStore();
  readonly pipeline: OrderSubmissionPipeline;

  private readonly consumers = new Set<OrderEntryConsumer>();
  private readonly priceCallbacks = new Map<string, ChannelCallback>();
  private readonly watchlist = new Set<string>();
  private readonly loops: RefreshLoop[];
  private readonly log: Logger;
  private readonly policy: StalenessPolicy;
  private readonly baseSubscriptions: Array<{ channel: string; owner: string; callback: ChannelCallback }>;

  private connectionState: ConnectionStateName | null = null;
  private detachConnectionEvents: (() => void) | null = null;
  private recovery: Promise<void> = Promise.resolve();
  private selectionVersion = 0;
  private selectedSymbol: string | null = null;
  private selectedChannel: string | null = null;
  private initialized = false;
  private initError: string | null = null;
  private disposed = false;

  constructor(private readonly deps: OrderEntryCoordinatorDeps) {
    this.log = withContext({ sessionId: deps.sessionId, userId: deps.userId }, deps.log ?? defaultLogger);
    this.policy = new StalenessPolicy(deps.staleness);
    this.subscriptions = new SubscriptionCoordinator(deps.bus, { log: this.log, retry: deps.subscriptionRetry });
    this.safety = new SafetyStateTracker(deps.api, { timeoutsMs: deps.safetyTimeoutsMs, log: this.log });
    this.safety.onChange((state) => this.emit('onSafetyState', (consumer) => consumer.onSafetyState?.(state)));

    this.pipeline = new OrderSubmissionPipeline({
      api: deps.api,
      safety: this.safety,
      market: this.market,
      intents: new IntentManager(deps.sessionId, deps.intentStore, { log: this.log, now: deps.now }),
      policy: this.policy,
      connection: () => ({ state: this.currentConnectionState(), readWrite: this.connectionState === 'CONNECTED' }),
      now: deps.now,
      log: this.log,
      confirmFetchTimeoutMs: deps.confirmFetchTimeoutMs,
      onStateChange: (snapshot) => this.emit('onOrderState', (consumer) => consumer.onOrderState?.(snapshot)),
    });

    const intervals = { ...DEFAULT_REFRESH_INTERVALS_MS, ...deps.refreshIntervalsMs };
    this.loops = [
      new RefreshLoop('positions', intervals.positions, (signal) => this.refreshPositions(signal), this.log),
      new RefreshLoop('buying_power', intervals.buyingPower, (signal) => this.refreshBuyingPower(signal), this.log),
      new RefreshLoop('risk_limits', intervals.riskLimits, (signal) => this.refreshRiskLimits(signal), this.log),
    ];

    this.baseSubscriptions = [
      {
        channel: SAFETY_CHANNELS.kill_switch,
        owner: OWNERS.killSwitch,
        callback: (payload) => this.handleSafetyPush('kill_switch', payload),
      },
      {
        channel: SAFETY_CHANNELS.circuit_breaker,
        owner: OWNERS.circuitBreaker,
        callback: (payload) => this.handleSafetyPush('circuit_breaker', payload),
      },
      {
        channel: CONNECTION_CHANNEL,
        owner: OWNERS.connection,
        callback: (payload) => this.handleConnectionPush(payload),
      },
      {
        channel: positionsChannel(deps.userId),
        owner: OWNERS.positions,
        callback: (payload) => this.handlePositionsPush(payload),
      },
    ];
  }

  register(consumer: OrderEntryConsumer): () => void {
    this.consumers.add(consumer);
    return () => {
      this.consumers.delete(consumer);
    };
  }

  /**
   * Subscribes the session channels, fetches safety state authoritatively,
   * loads positions, buying power and risk limits, restores a pending intent
   * and starts the refresh loops. On failure everything acquired is released
   * and trading stays blocked.
   */
  async initialize(): Promise<void> {
    if (this.disposed) {
      throw new ValidationError('session_disposed', 'Order entry session is closed');
    }
    if (this.initialized) {
      return;
    }

    if (this.deps.connectionEvents) {
      const events = this.deps.connectionEvents;
      this.detachConnectionEvents = events.onConnectionState((state) => this.applyConnectionState(state));
      this.applyConnectionState(events.connectionState());
    }

    try {
      const results = await Promise.allSettled(
        this.baseSubscriptions.map(({ channel, owner, callback }) => this.subscriptions.acquire(channel, owner, callback))
      );
      const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
      if (failure) {
        throw failure.reason;
      }

      await this.safety.initialize();
      await Promise.all([
        this.refreshPositions(),
        this.refreshBuyingPower(),
        this.refreshRiskLimits(),
      ]);
      await this.pipeline.restore();
      this.assertNotDisposed();

      for (const loop of this.loops) {
        loop.start();
      }
      this.initialized = true;
      this.initError = null;
      this.log.info('ORDER_ENTRY_INITIALIZED', { channels: this.subscriptions.activeChannels() });
    } catch (error) {
      this.initError = errorMessage(error);
      this.log.error('ORDER_ENTRY_INIT_FAILED', { error: this.initError });
      await this.rollbackInitialization();
      throw error;
    }
  }

  /**
   * Moves the `selected_symbol` ownership to `symbol`. Each call takes a new
   * version; after every await the call gives up if a newer selection exists,
   * and a subscription that completed for a superseded symbol is released.
   */
  async selectSymbol(input: string | null): Promise<SelectionResult> {
    const symbol = input === null ? null : normalizeSymbol(input);
    if (input !== null && !symbol) {
      throw new ValidationError('invalid_symbol', `Invalid symbol: ${String(input)}`);
    }
    this.assertNotDisposed();

    this.selectionVersion += 1;
    const version = this.selectionVersion;
    const previousChannel = this.selectedChannel;
    this.selectedChannel = null;
    this.selectedSymbol = symbol;
    this.emit('onSelectionChanged', (consumer) => consumer.onSelectionChanged?.(symbol));

    const superseded = (): SelectionResult => ({ symbol, subscribed: false, superseded: true });

    if (previousChannel) {
      await this.subscriptions.release(previousChannel, OWNERS.selectedSymbol);
    }
    if (this.isStale(version)) {
      return superseded();
    }

    await this.pipeline.selectSymbol(symbol);
    if (this.isStale(version)) {
      return superseded();
    }
    if (!symbol) {
      return { symbol, subscribed: false, superseded: false };
    }

    const channel = priceChannel(symbol);
    this.selectedChannel = channel;
    try {
      await this.subscriptions.acquire(channel, OWNERS.selectedSymbol, this.priceCallback(symbol));
    } catch (error) {
      if (error instanceof ProgrammingInvariantError) {
        throw error;
      }
      if (error instanceof SubscriptionCancelledError || this.isStale(version)) {
        return superseded();
      }
      this.log.warn('SELECTION_SUBSCRIBE_FAILED', { symbol, error: errorMessage(error) });
      return { symbol, subscribed: false, superseded: false };
    }

    if (this.isStale(version)) {
      if (this.selectedChannel !== channel && this.subscriptions.ownersOf(channel).includes(OWNERS.selectedSymbol)) {
        await this.subscriptions.release(channel, OWNERS.selectedSymbol);
      }
      return superseded();
    }
    this.log.info('SYMBOL_SELECTED', { symbol });
    return { symbol, subscribed: true, superseded: false };
  }

  async watchSymbol(input: string): Promise<boolean> {
    const symbol = normalizeSymbol(input);
    if (!symbol) {
      throw new ValidationError('invalid_symbol', `Invalid symbol: ${input}`);
    }
    this.assertNotDisposed();
    if (this.watchlist.has(symbol)) {
      return this.subscriptions.isSubscribed(priceChannel(symbol));
    }
    this.watchlist.add(symbol);
    try {
      await this.subscriptions.acquire(priceChannel(symbol), OWNERS.watchlist, this.priceCallback(symbol));
      return true;
    } catch (error) {
      if (error instanceof ProgrammingInvariantError) {
        throw error;
      }
      this.log.warn('WATCHLIST_SUBSCRIBE_FAILED', { symbol, error: errorMessage(error) });
      return false;
    }
  }

  async unwatchSymbol(input: string): Promise<void> {
    const symbol = normalizeSymbol(input);
    if (!symbol || !this.watchlist.delete(symbol)) {
      return;
    }
    await this.subscriptions.release(priceChannel(symbol), OWNERS.watchlist);
  }

  async refreshRecentFills(): Promise<RecentFills> {
    this.assertNotDisposed();
    const fills = await this.deps.api.fetchRecentFills();
    if (!this.disposed) {
      this.emit('onRecentFills', (consumer) => consumer.onRecentFills?.(fills));
    }
    return fills;
  }

  /** Resolves once any in-flight reconnect recovery has finished. */
  whenRecovered(): Promise<void> {
    return this.recovery;
  }

  status(): CoordinatorStatus {
    const outcome = this.pipeline.check();
    return {
      sessionId: this.deps.sessionId,
      userId: this.deps.userId,
      initialized: this.initialized,
      initError: this.initError,
      disposed: this.disposed,
      selectedSymbol: this.selectedSymbol,
      watchlist: [...this.watchlist].sort(),
      connection: { state: this.currentConnectionState(), readOnly: this.connectionState !== 'CONNECTED' },
      safety: {
        kill_switch: this.safety.current('kill_switch'),
        circuit_breaker: this.safety.current('circuit_breaker'),
      },
      submission: outcome.ok ? { allowed: true, block: null } : { allowed: false, block: outcome.block },
      order: this.pipeline.snapshot(),
      subscriptions: {
        active: this.subscriptions.activeChannels(),
        pending: this.subscriptions.pendingChannels(),
        failed: this.subscriptions.failedChannels(),
      },
    };
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    for (const loop of this.loops) {
      loop.stop();
    }
    this.detachConnectionEvents?.();
    this.detachConnectionEvents = null;
    this.pipeline.dispose();
    this.safety.dispose();
    await this.subscriptions.dispose();
    this.consumers.clear();
    this.log.info('ORDER_ENTRY_DISPOSED', {});
  }

  /** Feeds a connection state from the bus channel or the transport. */
  applyConnectionState(next: ConnectionStateName): void {
    if (this.disposed) {
      return;
    }
    const previous = this.connectionState;
    this.connectionState = next;
    if (previous === next) {
      return;
    }

    const readOnly = next !== 'CONNECTED';
    this.log.info('CONNECTION_STATE_CHANGED', { previous, next, readOnly });
    this.emit('onConnectionState', (consumer) => consumer.onConnectionState?.(next, readOnly));

    if (next === 'CONNECTED' && previous !== null && RESUBSCRIBE_FROM.has(previous)) {
      this.recovery = this.recovery.then(() => this.recoverAfterReconnect());
    }
  }

  private async recoverAfterReconnect(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.log.info('RECONNECT_RECOVERY_STARTED', {});
    try {
      await this.safety.refreshAll('session_init');
      const resubscribed = await this.subscriptions.resubscribeAll();
      const retried = await this.subscriptions.retryFailed();
      this.log.info('RECONNECT_RECOVERY_FINISHED', {
        resubscribed: resubscribed.recovered.length,
        resubscribeFailed: resubscribed.failed,
        retried: retried.recovered.length,
        stillFailed: retried.failed,
      });
    } catch (error) {
      this.log.error('RECONNECT_RECOVERY_FAILED', { error: errorMessage(error) });
    }
  }

  private handleSafetyPush(kind: SafetyKind, payload: unknown): void {
    if (this.disposed) {
      return;
    }
    this.safety.applyPush(kind, payload);
  }

  private handleConnectionPush(payload: unknown): void {
    const state = parseConnectionState(payload);
    if (state === 'UNKNOWN') {
      this.log.warn('CONNECTION_PAYLOAD_INVALID', { payload });
    }
    this.applyConnectionState(state);
  }

  private handlePositionsPush(payload: unknown): void {
    if (this.disposed) {
      return;
    }
    const parsed = parsePositionsPayload(payload);
    if (!parsed.ok) {
      this.log.warn('POSITIONS_PAYLOAD_INVALID', { error: parsed.error });
      this.market.invalidatePositions();
      return;
    }
    this.acceptPositions(parsed.value);
  }

  private priceCallback(symbol: string): ChannelCallback {
    let callback = this.priceCallbacks.get(symbol);
    if (!callback) {
      callback = (payload) => this.handlePriceTick(symbol, payload);
      this.priceCallbacks.set(symbol, callback);
    }
    return callback;
  }

  private handlePriceTick(symbol: string, payload: unknown): void {
    if (this.disposed) {
      return;
    }
    const parsed = parsePriceTick(payload, symbol);
    if (!parsed.ok) {
      this.log.warn('PRICE_TICK_INVALID', { symbol, error: parsed.error });
      this.market.invalidatePrice(symbol);
      return;
    }
    if (this.market.setPrice(parsed.value)) {
      const tick = parsed.value;
      this.emit('onPriceTick', (consumer) => consumer.onPriceTick?.(tick));
    }
  }

  private acceptPositions(snapshot: PositionsSnapshot): void {
    if (this.market.setPositions(snapshot)) {
      this.emit('onPositions', (consumer) => consumer.onPositions?.(snapshot));
    }
  }

  private async refreshPositions(signal?: AbortSignal): Promise<void> {
    try {
      const snapshot = await this.deps.api.fetchPositions(signal);
      if (!this.disposed) {
        this.acceptPositions(snapshot);
      }
    } catch (error) {
      this.log.warn('POSITIONS_REFRESH_FAILED', { error: errorMessage(error) });
      this.market.invalidatePositions();
    }
  }

  private async refreshBuyingPower(signal?: AbortSignal): Promise<void> {
    try {
      const account = await this.deps.api.fetchAccount(signal);
      if (!this.disposed) {
        this.market.setBuyingPower(account);
      }
    } catch (error) {
      this.log.warn('BUYING_POWER_REFRESH_FAILED', { error: errorMessage(error) });
      this.market.invalidateBuyingPower();
    }
  }

  private async refreshRiskLimits(signal?: AbortSignal): Promise<void> {
    try {
      const limits = await this.deps.api.fetchRiskLimits(signal);
      if (!this.disposed) {
        this.market.setRiskLimits(limits);
      }
    } catch (error) {
      this.log.warn('RISK_LIMITS_REFRESH_FAILED', { error: errorMessage(error) });
      this.market.invalidateRiskLimits();
    }
  }

  private async rollbackInitialization(): Promise<void> {
    for (const loop of this.loops) {
      loop.stop();
    }
    for (const { channel, owner } of this.baseSubscriptions) {
      await this.subscriptions.release(channel, owner);
    }
    this.safety.markUnverified('Initialization failed');
  }

  private emit(event: keyof OrderEntryConsumer, call: (consumer: OrderEntryConsumer) => void): void {
    for (const consumer of this.consumers) {
      try {
        call(consumer);
      } catch (error) {
        this.log.error('CONSUMER_CALLBACK_FAILED', { event, error: errorMessage(error) });
      }
    }
  }

  private currentConnectionState(): ConnectionStateName {
    return this.connectionState ?? 'UNKNOWN';
  }

  private isStale(version: number): boolean {
    return this.disposed || version !== this.selectionVersion;
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new ValidationError('session_disposed', 'Order entry session is closed');
    }
  }
}
