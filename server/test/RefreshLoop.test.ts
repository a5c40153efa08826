import { afterEach, describe, expect, it, vi } from 'vitest';
import { RefreshLoop } from '../coordinator/RefreshLoop';
import { deferred, recordingLogger } from './helpers';

describe('RefreshLoop', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs on every interval while started', async () => {
    vi.useFakeTimers();
    const task = vi.fn(async (_signal: AbortSignal) => undefined);
    const loop = new RefreshLoop('positions', 1_000, task, recordingLogger());

    loop.start();
    await vi.advanceTimersByTimeAsync(3_000);
    loop.stop();
    await vi.advanceTimersByTimeAsync(3_000);

    expect(task).toHaveBeenCalledTimes(3);
    expect(loop.isRunning()).toBe(false);
  });

  it('skips a tick while the previous run is in flight', async () => {
    const gate = deferred<void>();
    const log = recordingLogger();
    const task = vi.fn((_signal: AbortSignal) => gate.promise);
    const loop = new RefreshLoop('account', 1_000, task, log);

    expect(loop.tick()).toBe(true);
    expect(loop.tick()).toBe(false);
    expect(loop.skippedTicks()).toBe(1);

    gate.resolve();
    await loop.whenIdle();
    expect(loop.tick()).toBe(true);
    expect(task).toHaveBeenCalledTimes(2);
    expect(log.events('debug')).toEqual(['REFRESH_TICK_SKIPPED']);
  });

  it('logs a failed run and keeps going', async () => {
    const log = recordingLogger();
    const loop = new RefreshLoop(
      'risk_limits',
      1_000,
      async () => {
        throw new Error('boom');
      },
      log
    );

    loop.tick();
    await loop.whenIdle();

    expect(log.events('warn')).toEqual(['REFRESH_FAILED']);
    expect(loop.tick()).toBe(true);
    await loop.whenIdle();
  });

  it('aborts the signal of a run in flight on stop', async () => {
    const seen: AbortSignal[] = [];
    const gate = deferred<void>();
    const loop = new RefreshLoop(
      'positions',
      1_000,
      (signal) => {
        seen.push(signal);
        return gate.promise;
      },
      recordingLogger()
    );

    loop.start();
    loop.tick();
    loop.stop();

    expect(seen[0].aborted).toBe(true);
    gate.resolve();
    await loop.whenIdle();
  });
});
