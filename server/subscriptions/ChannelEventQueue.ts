import { errorMessage } from '../errors/OrderEntryError';
import { Logger } from '../utils/logger';

type Processor = (event: unknown) => void | Promise<void>;

interface QueuedEvent {
  event: unknown;
  done: () => void;
}

/** Runs a channel's messages one at a time, in arrival order. */
export class ChannelEventQueue {
  private readonly queue: QueuedEvent[] = [];
  private processing = false;
  private closed = false;

  constructor(
    private readonly channel: string,
    private readonly processor: Processor,
    private readonly log: Logger
  ) {}

  /** Resolves once this event has been processed (or dropped on close). Never rejects. */
  enqueue(event: unknown): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ event, done: resolve });
      void this.processNext();
    });
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  /** Drops pending events; the one being processed runs to completion. */
  close(): void {
    this.closed = true;
    for (const item of this.queue.splice(0)) {
      item.done();
    }
  }

  private async processNext(): Promise<void> {
    if (this.processing) return;
    this.processing = true;
    try {
      let item = this.queue.shift();
      while (item) {
        try {
          await this.processor(item.event);
        } catch (error) {
          this.log.error('CHANNEL_DISPATCH_FAILED', { channel: this.channel, error: errorMessage(error) });
        } finally {
          item.done();
        }
        item = this.closed ? undefined : this.queue.shift();
      }
    } finally {
      this.processing = false;
    }
  }
}
