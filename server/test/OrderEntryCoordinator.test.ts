import { afterEach, describe, expect, it, vi } from 'vitest';
import type { PriceTick } from '../api/payloads';
import type { ConnectionStateName } from '../bus/types';
import type { ConnectionEvents, ConnectionStateListener } from '../bus/WsBusClient';
import { OrderEntryCoordinator, parseConnectionState } from '../coordinator/OrderEntryCoordinator';
import { ValidationError } from '../errors/OrderEntryError';
import { InMemoryIntentStore } from '../orders/PendingIntentStore';
import type { SafetyKind } from '../safety/SafetyState';
import { FakeBus, deferred, fakeTradingApi, recordingLogger } from './helpers';

const NOW = new Date('2026-03-02T15:00:00.000Z');
const open: OrderEntryCoordinator[] = [];
const TICK = { symbol: 'AAPL', price: '187.5', timestamp: '2026-03-02T15:00:00Z' };

class FakeConnection implements ConnectionEvents {
  private state: ConnectionStateName = 'CONNECTED';
  private readonly listeners = new Set<ConnectionStateListener>();

  connectionState(): ConnectionStateName {
    return this.state;
  }

  onConnectionState(listener: ConnectionStateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  set(next: ConnectionStateName): void {
    this.state = next;
    for (const listener of this.listeners) {
      listener(next);
    }
  }
}

function setup() {
  const bus = new FakeBus();
  const log = recordingLogger();
  const connection = new FakeConnection();
  const safetyValues: Record<SafetyKind, unknown> = {
    kill_switch: { state: 'ACTIVE' },
    circuit_breaker: { state: 'OPEN' },
  };
  const api = fakeTradingApi(safetyValues, NOW);
  const coordinator = new OrderEntryCoordinator({
    sessionId: 's1',
    userId: 'u1',
    bus,
    api,
    intentStore: new InMemoryIntentStore(),
    connectionEvents: connection,
    subscriptionRetry: { enabled: false },
    now: () => NOW,
    log,
  });
  open.push(coordinator);
  return { bus, log, connection, api, coordinator, safetyValues };
}

describe('parseConnectionState', () => {
  it('reads bare strings and state records and falls back to UNKNOWN', () => {
    expect(parseConnectionState('connected')).toBe('CONNECTED');
    expect(parseConnectionState({ state: ' degraded ' })).toBe('DEGRADED');
    expect(parseConnectionState({ state: 'flapping' })).toBe('UNKNOWN');
    expect(parseConnectionState(42)).toBe('UNKNOWN');
  });
});

describe('OrderEntryCoordinator', () => {
  afterEach(async () => {
    await Promise.all(open.splice(0).map((coordinator) => coordinator.dispose()));
  });

  it('subscribes the session channels and loads state on initialize', async () => {
    const { bus, coordinator, api } = setup();

    await coordinator.initialize();

    expect(bus.calls).toEqual([
      'subscribe:kill_switch:state',
      'subscribe:circuit_breaker:state',
      'subscribe:connection:state',
      'subscribe:positions:u1',
    ]);
    expect(api.readSafetyState).toHaveBeenCalledTimes(2);
    const status = coordinator.status();
    expect(status.initialized).toBe(true);
    expect(status.connection).toEqual({ state: 'CONNECTED', readOnly: false });
    expect(status.safety.kill_switch.state).toBe('SAFE');
    expect(status.submission.block?.code).toBe('symbol_required');
  });

  it('allows submission once the form and market data are complete', async () => {
    const { bus, coordinator } = setup();
    await coordinator.initialize();
    await coordinator.selectSymbol('aapl');
    await bus.publish('price.updated.AAPL', TICK);
    await coordinator.pipeline.updateForm({ qty: 10 });

    expect(coordinator.status().submission).toEqual({ allowed: true, block: null });

    await bus.publish('kill_switch:state', { state: 'ENGAGED', reason: 'risk desk halt' });
    expect(coordinator.status().submission.block).toEqual({
      category: 'safety',
      code: 'kill_switch_blocked',
      reason: 'Kill switch: risk desk halt',
      verification: 'confirmed',
    });
  });

  it('rolls back and stays blocked when a base subscription fails', async () => {
    const { bus, coordinator, log } = setup();
    bus.failSubscribe('connection:state');

    await expect(coordinator.initialize()).rejects.toThrow(
      'subscribe_failed:connection:state: bus refused connection:state'
    );

    expect(bus.calls.filter((call) => call.startsWith('unsubscribe:')).sort()).toEqual([
      'unsubscribe:circuit_breaker:state',
      'unsubscribe:kill_switch:state',
      'unsubscribe:positions:u1',
    ]);
    const status = coordinator.status();
    expect(status.initialized).toBe(false);
    expect(status.initError).toBe('subscribe_failed:connection:state: bus refused connection:state');
    expect(status.subscriptions.active).toEqual([]);
    expect(status.safety.kill_switch.reason).toBe('Initialization failed');
    expect(log.events('error')).toContain('ORDER_ENTRY_INIT_FAILED');
  });

  it('ends up subscribed to the last of two rapid selections only', async () => {
    const { bus, coordinator } = setup();
    await coordinator.initialize();
    const gate = bus.gate('price.updated.AAPL');

    const first = coordinator.selectSymbol('AAPL');
    await vi.waitFor(() => expect(bus.calls).toContain('subscribe:price.updated.AAPL'));
    const second = await coordinator.selectSymbol('MSFT');
    gate.resolve();

    expect(await first).toEqual({ symbol: 'AAPL', subscribed: false, superseded: true });
    expect(second).toEqual({ symbol: 'MSFT', subscribed: true, superseded: false });
    expect(bus.count('unsubscribe:price.updated.AAPL')).toBe(1);
    expect(coordinator.subscriptions.activeChannels()).toContain('price.updated.MSFT');
    expect(coordinator.subscriptions.activeChannels()).not.toContain('price.updated.AAPL');
    expect(coordinator.pipeline.getDraft().symbol).toBe('MSFT');
  });

  it('ends up on the last selection when the later subscribe completes first', async () => {
    const { bus, coordinator } = setup();
    await coordinator.initialize();
    const aapl = bus.gate('price.updated.AAPL');
    const msft = bus.gate('price.updated.MSFT');

    const first = coordinator.selectSymbol('AAPL');
    await vi.waitFor(() => expect(bus.calls).toContain('subscribe:price.updated.AAPL'));
    const second = coordinator.selectSymbol('MSFT');
    await vi.waitFor(() => expect(bus.calls).toContain('subscribe:price.updated.MSFT'));

    msft.resolve();
    expect(await second).toEqual({ symbol: 'MSFT', subscribed: true, superseded: false });
    aapl.resolve();
    expect(await first).toEqual({ symbol: 'AAPL', subscribed: false, superseded: true });

    expect(bus.count('unsubscribe:price.updated.AAPL')).toBe(1);
    expect(coordinator.subscriptions.activeChannels()).toContain('price.updated.MSFT');
    expect(coordinator.subscriptions.activeChannels()).not.toContain('price.updated.AAPL');
    expect(coordinator.subscriptions.ownersOf('price.updated.AAPL')).toEqual([]);
  });

  it('ends up on the last selection when the earlier subscribe completes while the later one is pending', async () => {
    const { bus, coordinator } = setup();
    await coordinator.initialize();
    const aapl = bus.gate('price.updated.AAPL');
    const msft = bus.gate('price.updated.MSFT');

    const first = coordinator.selectSymbol('AAPL');
    await vi.waitFor(() => expect(bus.calls).toContain('subscribe:price.updated.AAPL'));
    const second = coordinator.selectSymbol('MSFT');
    await vi.waitFor(() => expect(bus.calls).toContain('subscribe:price.updated.MSFT'));

    aapl.resolve();
    expect(await first).toEqual({ symbol: 'AAPL', subscribed: false, superseded: true });
    expect(coordinator.subscriptions.pendingChannels()).toEqual(['price.updated.MSFT']);
    msft.resolve();
    expect(await second).toEqual({ symbol: 'MSFT', subscribed: true, superseded: false });

    expect(bus.count('unsubscribe:price.updated.AAPL')).toBe(1);
    expect(coordinator.subscriptions.activeChannels()).toContain('price.updated.MSFT');
    expect(coordinator.subscriptions.activeChannels()).not.toContain('price.updated.AAPL');
    expect(coordinator.pipeline.getDraft().symbol).toBe('MSFT');
  });

  it('clears the selection with null', async () => {
    const { coordinator } = setup();
    await coordinator.initialize();
    await coordinator.selectSymbol('AAPL');

    expect(await coordinator.selectSymbol(null)).toEqual({ symbol: null, subscribed: false, superseded: false });
    expect(coordinator.subscriptions.activeChannels()).not.toContain('price.updated.AAPL');
  });

  it('rejects an invalid symbol', async () => {
    const { coordinator } = setup();
    await expect(coordinator.selectSymbol('not a symbol!')).rejects.toMatchObject({ code: 'invalid_symbol' });
  });

  it('shares a channel between the selection and the watchlist', async () => {
    const { bus, coordinator } = setup();
    await coordinator.initialize();

    expect(await coordinator.watchSymbol('AAPL')).toBe(true);
    await coordinator.selectSymbol('AAPL');
    await coordinator.selectSymbol('MSFT');

    expect(bus.count('subscribe:price.updated.AAPL')).toBe(1);
    expect(bus.count('unsubscribe:price.updated.AAPL')).toBe(0);
    expect(coordinator.subscriptions.ownersOf('price.updated.AAPL')).toEqual(['watchlist']);

    await coordinator.unwatchSymbol('AAPL');
    expect(bus.count('unsubscribe:price.updated.AAPL')).toBe(1);
  });

  it('resubscribes every channel for every owner after a reconnect', async () => {
    const { bus, coordinator, connection, api } = setup();
    const changes: Array<[ConnectionStateName, boolean]> = [];
    await coordinator.initialize();
    coordinator.register({ onConnectionState: (state, readOnly) => changes.push([state, readOnly]) });
    await coordinator.watchSymbol('AAPL');
    await coordinator.selectSymbol('AAPL');

    connection.set('DISCONNECTED');
    expect(coordinator.status().connection).toEqual({ state: 'DISCONNECTED', readOnly: true });
    connection.set('CONNECTED');
    await coordinator.whenRecovered();

    expect(bus.count('subscribe:price.updated.AAPL')).toBe(2);
    expect(bus.count('subscribe:kill_switch:state')).toBe(2);
    expect(bus.count('subscribe:positions:u1')).toBe(2);
    expect(coordinator.subscriptions.ownersOf('price.updated.AAPL')).toEqual(['selected_symbol', 'watchlist']);
    expect(api.readSafetyState).toHaveBeenCalledTimes(4);
    expect(changes).toEqual([
      ['DISCONNECTED', true],
      ['CONNECTED', false],
    ]);
  });

  it('does not resubscribe when recovering from DEGRADED', async () => {
    const { bus, coordinator, connection } = setup();
    await coordinator.initialize();

    connection.set('DEGRADED');
    connection.set('CONNECTED');
    await coordinator.whenRecovered();

    expect(bus.count('subscribe:kill_switch:state')).toBe(1);
  });

  it('treats an unreadable connection payload as UNKNOWN and recovers from it', async () => {
    const { bus, coordinator, log } = setup();
    await coordinator.initialize();

    await bus.publish('connection:state', { state: 'flapping' });
    expect(coordinator.status().connection).toEqual({ state: 'UNKNOWN', readOnly: true });
    expect(log.events('warn')).toContain('CONNECTION_PAYLOAD_INVALID');

    await bus.publish('connection:state', { state: 'CONNECTED' });
    await coordinator.whenRecovered();
    expect(bus.count('subscribe:circuit_breaker:state')).toBe(2);
  });

  it('keeps delivering to other consumers when one throws', async () => {
    const { bus, coordinator, log } = setup();
    const ticks: PriceTick[] = [];
    coordinator.register({
      onPriceTick: () => {
        throw new Error('render failed');
      },
    });
    coordinator.register({ onPriceTick: (tick) => ticks.push(tick) });
    await coordinator.initialize();
    await coordinator.selectSymbol('AAPL');

    await bus.publish('price.updated.AAPL', TICK);

    expect(ticks.map((tick) => tick.price.toString())).toEqual(['187.5']);
    expect(log.events('error')).toEqual(['CONSUMER_CALLBACK_FAILED']);
  });

  it('forgets a price when its tick is malformed', async () => {
    const { bus, coordinator, log } = setup();
    await coordinator.initialize();
    await coordinator.selectSymbol('AAPL');
    await bus.publish('price.updated.AAPL', TICK);

    await bus.publish('price.updated.AAPL', { ...TICK, price: -1 });

    expect(coordinator.market.priceSnapshot('AAPL').value).toBeNull();
    expect(log.events('warn')).toContain('PRICE_TICK_INVALID');
  });

  it('forgets positions when the push is malformed', async () => {
    const { bus, coordinator } = setup();
    await coordinator.initialize();

    await bus.publish('positions:u1', { positions: 'none', timestamp: '2026-03-02T15:00:00Z' });

    expect(coordinator.market.positionsSnapshot().value).toBeNull();
  });

  it('emits recent fills to consumers', async () => {
    const { coordinator } = setup();
    const seen = deferred<number>();
    coordinator.register({ onRecentFills: (fills) => seen.resolve(fills.fills.length) });

    await coordinator.refreshRecentFills();

    expect(await seen.promise).toBe(0);
  });

  it('releases everything on dispose and refuses further work', async () => {
    const { bus, coordinator } = setup();
    await coordinator.initialize();
    await coordinator.selectSymbol('AAPL');

    await coordinator.dispose();

    expect(bus.calls.filter((call) => call.startsWith('unsubscribe:')).sort()).toEqual([
      'unsubscribe:circuit_breaker:state',
      'unsubscribe:connection:state',
      'unsubscribe:kill_switch:state',
      'unsubscribe:positions:u1',
      'unsubscribe:price.updated.AAPL',
    ]);
    expect(coordinator.status().disposed).toBe(true);
    await expect(coordinator.selectSymbol('MSFT')).rejects.toBeInstanceOf(ValidationError);
    await expect(coordinator.initialize()).rejects.toMatchObject({ code: 'session_disposed' });
  });
});
