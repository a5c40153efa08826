import Decimal from 'decimal.js';
import { vi } from 'vitest';
import type { TradingApi } from '../api/TradingApiClient';
import type { BusClient, BusMessageHandler } from '../bus/types';
import type { SafetyKind } from '../safety/SafetyState';
import type { Logger } from '../utils/logger';

export interface RecordingLogger extends Logger {
  events(level?: 'debug' | 'info' | 'warn' | 'error'): string[];
}

/** Logger that keeps event names instead of writing them. */
export function recordingLogger(): RecordingLogger {
  const lines: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; event: string }> = [];
  return {
    debug: vi.fn((event: string) => void lines.push({ level: 'debug', event })),
    info: vi.fn((event: string) => void lines.push({ level: 'info', event })),
    warn: vi.fn((event: string) => void lines.push({ level: 'warn', event })),
    error: vi.fn((event: string) => void lines.push({ level: 'error', event })),
    events: (level) => lines.filter((line) => !level || line.level === level).map((line) => line.event),
  };
}

/** Promise whose settlement the test controls. */
export function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Lets queued microtasks and already-resolved promise chains run. */
export async function flushMicrotasks(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}

/**
 * In-process bus. Subscribes succeed at once unless the test gates a channel
 * (the call waits for the gate) or queues failures for it.
 */
export class FakeBus implements BusClient {
  readonly calls: string[] = [];
  readonly handlers = new Map<string, BusMessageHandler>();
  private readonly gates = new Map<string, Array<ReturnType<typeof deferred<void>>>>();
  private readonly failures = new Map<string, number>();
  private readonly unsubscribeFailures = new Set<string>();

  /** The next subscribe of `channel` waits until the returned gate settles. */
  gate(channel: string): ReturnType<typeof deferred<void>> {
    const gate = deferred<void>();
    const list = this.gates.get(channel) ?? [];
    list.push(gate);
    this.gates.set(channel, list);
    return gate;
  }

  failSubscribe(channel: string, times = 1): void {
    this.failures.set(channel, (this.failures.get(channel) ?? 0) + times);
  }

  failUnsubscribe(channel: string): void {
    this.unsubscribeFailures.add(channel);
  }

  async subscribe(channel: string, handler: BusMessageHandler): Promise<void> {
    this.calls.push(`subscribe:${channel}`);
    const gate = this.gates.get(channel)?.shift();
    if (gate) {
      await gate.promise;
    }
    const remaining = this.failures.get(channel) ?? 0;
    if (remaining > 0) {
      this.failures.set(channel, remaining - 1);
      throw new Error(`bus refused ${channel}`);
    }
    this.handlers.set(channel, handler);
  }

  async unsubscribe(channel: string): Promise<void> {
    this.calls.push(`unsubscribe:${channel}`);
    this.handlers.delete(channel);
    if (this.unsubscribeFailures.has(channel)) {
      throw new Error(`bus refused unsubscribe ${channel}`);
    }
  }

  /** Pushes a message to the channel's handler, if any. */
  async publish(channel: string, payload: unknown): Promise<void> {
    const handler = this.handlers.get(channel);
    if (handler) {
      await handler(payload);
    }
  }

  count(call: string): number {
    return this.calls.filter((entry) => entry === call).length;
  }
}

/**
 * Trading API answering from fixed data stamped `now`. Safety reads return
 * whatever `safetyValues` holds at call time.
 */
export function fakeTradingApi(safetyValues: Record<SafetyKind, unknown>, now: Date) {
  return {
    readSafetyState: vi.fn(async (kind: SafetyKind, _signal: AbortSignal): Promise<unknown> => safetyValues[kind]),
    fetchPositions: vi.fn(async () => ({ positions: [], timestamp: now })),
    fetchAccount: vi.fn(async () => ({ buyingPower: new Decimal(100_000), timestamp: now })),
    fetchRiskLimits: vi.fn(async () => ({
      limits: {
        maxPositionPerSymbol: new Decimal(1000),
        maxNotionalPerOrder: new Decimal(50_000),
        maxTotalExposure: new Decimal(200_000),
      },
      timestamp: now,
    })),
    fetchRecentFills: vi.fn(async () => ({ fills: [], timestamp: now })),
    fetchQuote: vi.fn(async (symbol: string) => ({ symbol, last: new Decimal(187.5), timestamp: now })),
    submitOrder: vi.fn(async () => ({ orderId: 'o-1', status: 'accepted', message: null })),
  } satisfies TradingApi;
}
