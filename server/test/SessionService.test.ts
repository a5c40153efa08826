import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_REFRESH_INTERVALS_MS } from '../coordinator/OrderEntryCoordinator';
import { TransientIOError, ValidationError } from '../errors/OrderEntryError';
import { InMemoryIntentStore } from '../orders/PendingIntentStore';
import type { SafetyKind } from '../safety/SafetyState';
import { DEFAULT_SAFETY_FETCH_TIMEOUTS_MS } from '../safety/SafetyStateTracker';
import { DEFAULT_STALENESS_THRESHOLDS_MS } from '../safety/StalenessPolicy';
import { SessionService, SessionTransport } from '../session/SessionService';
import { FakeBus, fakeTradingApi, recordingLogger } from './helpers';

const NOW = new Date();
const services: SessionService[] = [];

interface FakeTransport extends SessionTransport {
  bus: FakeBus;
  closed: boolean;
}

function setup(options: { maxSessions?: number; failChannel?: string } = {}) {
  const log = recordingLogger();
  const transports: FakeTransport[] = [];
  const safetyValues: Record<SafetyKind, unknown> = {
    kill_switch: { state: 'ACTIVE' },
    circuit_breaker: { state: 'OPEN' },
  };
  let ids = 0;
  const service = new SessionService({
    config: {
      staleness: DEFAULT_STALENESS_THRESHOLDS_MS,
      safetyTimeoutsMs: DEFAULT_SAFETY_FETCH_TIMEOUTS_MS,
      confirmFetchTimeoutMs: 2_000,
      refreshIntervalsMs: DEFAULT_REFRESH_INTERVALS_MS,
      subscriptionRetry: { enabled: false, minBackoffMs: 1_000, maxBackoffMs: 30_000 },
      maxSessions: options.maxSessions ?? 10,
    },
    intentStore: new InMemoryIntentStore(),
    transportFactory: () => {
      const bus = new FakeBus();
      if (options.failChannel) {
        bus.failSubscribe(options.failChannel);
      }
      const transport: FakeTransport = {
        bus,
        closed: false,
        connect: vi.fn(async () => undefined),
        close: () => {
          transport.closed = true;
        },
      };
      transports.push(transport);
      return transport;
    },
    apiFactory: () => fakeTradingApi(safetyValues, NOW),
    generateId: () => `session-${++ids}`,
    log,
  });
  services.push(service);
  return { service, transports, log };
}

describe('SessionService', () => {
  afterEach(async () => {
    await Promise.all(services.splice(0).map((service) => service.closeAll()));
  });

  it('opens an initialized session under a generated id', async () => {
    const { service, transports } = setup();

    const coordinator = await service.create({ userId: 'trader-1' });

    expect(coordinator.status()).toMatchObject({ sessionId: 'session-1', userId: 'trader-1', initialized: true });
    expect(service.get('session-1')).toBe(coordinator);
    expect(service.list()).toEqual([{ sessionId: 'session-1', userId: 'trader-1', createdAt: expect.any(String) }]);
    expect(transports[0].connect).toHaveBeenCalledTimes(1);
  });

  it('validates user and session ids', async () => {
    const { service } = setup();

    await expect(service.create({ userId: '' })).rejects.toMatchObject({ code: 'invalid_user_id' });
    await expect(service.create({ userId: 'u1', sessionId: 'has space' })).rejects.toMatchObject({
      code: 'invalid_session_id',
    });
    expect(service.size()).toBe(0);
  });

  it('refuses a duplicate id and sessions beyond the limit', async () => {
    const { service } = setup({ maxSessions: 1 });
    await service.create({ userId: 'u1', sessionId: 'desk' });

    const duplicate = await service.create({ userId: 'u1', sessionId: 'desk' }).catch((e: unknown) => e);
    const overLimit = await service.create({ userId: 'u2' }).catch((e: unknown) => e);

    expect(duplicate).toBeInstanceOf(ValidationError);
    expect(duplicate).toMatchObject({ code: 'session_exists' });
    expect(overLimit).toBeInstanceOf(TransientIOError);
    expect(overLimit).toMatchObject({ code: 'session_limit', message: 'Session limit reached (1)' });
  });

  it('tears the session down when initialization fails', async () => {
    const { service, transports, log } = setup({ failChannel: 'kill_switch:state' });

    await expect(service.create({ userId: 'u1' })).rejects.toThrow('subscribe_failed:kill_switch:state');

    expect(service.has('session-1')).toBe(false);
    expect(transports[0].closed).toBe(true);
    expect(log.events('error')).toContain('SESSION_OPEN_FAILED');
  });

  it('closes a session once', async () => {
    const { service, transports } = setup();
    await service.create({ userId: 'u1' });

    expect(await service.close('session-1')).toBe(true);
    expect(await service.close('session-1')).toBe(false);
    expect(transports[0].closed).toBe(true);
    expect(() => service.get('session-1')).toThrow('Unknown session session-1');
  });

  it('resumes the pending intent of a reopened session', async () => {
    const { service, transports } = setup();
    const first = await service.create({ userId: 'u1', sessionId: 'desk' });
    await transports[0].bus.publish('connection:state', { state: 'CONNECTED' });
    await first.selectSymbol('AAPL');
    await transports[0].bus.publish('price.updated.AAPL', {
      symbol: 'AAPL',
      price: '187.5',
      timestamp: NOW.toISOString(),
    });
    await first.pipeline.updateForm({ qty: 10 });
    const preview = await first.pipeline.preview();
    if (!preview.ok) throw new Error(preview.block.reason);
    await service.close('desk');

    const reopened = await service.create({ userId: 'u1', sessionId: 'desk' });

    expect(reopened.pipeline.snapshot()).toMatchObject({
      intentId: preview.preview.intentId,
      form: { symbol: 'AAPL', qty: '10' },
      state: 'DRAFTING',
    });
  });
});
