import { errorMessage } from '../errors/OrderEntryError';
import { Logger } from '../utils/logger';

type RefreshTask = (signal: AbortSignal) => Promise<void>;

/**
 * Periodic refresh with at most one run in flight. A tick that fires while
 * the previous run is still going is skipped, not queued.
 */
export class RefreshLoop {
  private timer: NodeJS.Timeout | null = null;
  private controller = new AbortController();
  private inFlight: Promise<void> | null = null;
  private skipped = 0;

  constructor(
    readonly name: string,
    private readonly intervalMs: number,
    private readonly task: RefreshTask,
    private readonly log: Logger
  ) {}

  start(): void {
    if (this.timer) return;
    if (this.controller.signal.aborted) {
      this.controller = new AbortController();
    }
    this.timer = setInterval(() => {
      this.tick();
    }, Math.max(1, this.intervalMs));
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.controller.abort();
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  skippedTicks(): number {
    return this.skipped;
  }

  /** Starts a run unless one is in flight. Returns whether a run started. */
  tick(): boolean {
    if (this.inFlight) {
      this.skipped += 1;
      this.log.debug('REFRESH_TICK_SKIPPED', { loop: this.name, skipped: this.skipped });
      return false;
    }
    this.inFlight = this.run();
    return true;
  }

  whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  private async run(): Promise<void> {
    try {
      await this.task(this.controller.signal);
    } catch (error) {
      this.log.warn('REFRESH_FAILED', { loop: this.name, error: errorMessage(error) });
    } finally {
      this.inFlight = null;
    }
  }
}
