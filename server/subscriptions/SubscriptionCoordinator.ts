import {
  OrderEntryError,
  ProgrammingInvariantError,
  SubscriptionCancelledError,
  TransientIOError,
  errorMessage,
} from '../errors/OrderEntryError';
import { BusClient, BusMessageHandler } from '../bus/types';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { ChannelEventQueue } from './ChannelEventQueue';

export type ChannelCallback = (payload: unknown) => void | Promise<void>;

export interface SubscriptionRetryOptions {
  enabled: boolean;
  minBackoffMs: number;
  maxBackoffMs: number;
}

export interface SubscriptionCoordinatorOptions {
  log?: Logger;
  retry?: Partial<SubscriptionRetryOptions>;
}

export interface RecoveryReport {
  recovered: string[];
  failed: string[];
}

interface PendingSubscribe {
  promise: Promise<void>;
  cancel: (error: Error) => void;
}

interface FailedSubscription {
  owners: Set<string>;
  callback: ChannelCallback;
  error: string;
}

const DEFAULT_RETRY: SubscriptionRetryOptions = {
  enabled: true,
  minBackoffMs: 1_000,
  maxBackoffMs: 30_000,
};

/**
 * Sole owner of a session's bus subscriptions.
 *
 * Several logical owners may hold the same channel; the underlying subscribe
 * happens on the zero-to-one owner transition and the unsubscribe on the
 * one-to-zero transition. All map mutations happen synchronously between
 * awaits, so bus I/O never runs while the maps are half-updated.
 */
export class SubscriptionCoordinator {
  private readonly owners = new Map<string, Set<string>>();
  private readonly callbacks = new Map<string, ChannelCallback>();
  private readonly pending = new Map<string, PendingSubscribe>();
  private readonly failed = new Map<string, FailedSubscription>();
  private readonly active = new Set<string>();
  private readonly queues = new Map<string, ChannelEventQueue>();
  private readonly retry: SubscriptionRetryOptions;
  private readonly log: Logger;

  private disposed = false;
  private retryTimer: NodeJS.Timeout | null = null;
  private retryBackoffMs: number;

  constructor(private readonly bus: BusClient, options: SubscriptionCoordinatorOptions = {}) {
    this.log = options.log ?? defaultLogger;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.retryBackoffMs = this.retry.minBackoffMs;
  }

  /**
   * Registers `owner` on `channel`. Resolves once the channel is subscribed;
   * rejects with the subscribe error (every concurrent waiter gets it) or with
   * a ProgrammingInvariantError when `callback` differs from the one on record.
   */
  async acquire(channel: string, owner: string, callback: ChannelCallback): Promise<void> {
    await this.acquireOwners(channel, [owner], callback);
  }

  async release(channel: string, owner: string): Promise<void> {
    if (this.disposed) {
      return;
    }

    const failedEntry = this.failed.get(channel);
    if (failedEntry) {
      failedEntry.owners.delete(owner);
      if (failedEntry.owners.size === 0) {
        this.failed.delete(channel);
      }
    }

    const owners = this.owners.get(channel);
    if (!owners || !owners.delete(owner)) {
      return;
    }
    // A pending subscribe settles the orphan itself once it completes.
    if (owners.size > 0 || this.pending.has(channel)) {
      return;
    }

    this.forget(channel);
    await this.safeUnsubscribe(channel, 'released');
  }

  /** Re-issues every owned channel after a reconnect. One bad channel does not stop the rest. */
  async resubscribeAll(): Promise<RecoveryReport> {
    const report: RecoveryReport = { recovered: [], failed: [] };
    if (this.disposed) {
      return report;
    }

    const channels = [...this.active];
    if (channels.length > 0) {
      this.log.info('SUBSCRIPTIONS_RESUBSCRIBING', { count: channels.length });
    }

    for (const channel of channels) {
      if (this.disposed) {
        return report;
      }
      // The owner set identifies this registration; a release to zero or a
      // fresh acquire replaces it while the subscribe is in flight.
      const registration = this.owners.get(channel);
      const callback = this.callbacks.get(channel);
      if (!callback || !registration || registration.size === 0) {
        continue;
      }

      try {
        await this.bus.subscribe(channel, this.dispatcherFor(channel));
      } catch (error) {
        this.log.warn('SUBSCRIPTION_RESUBSCRIBE_FAILED', { channel, error: errorMessage(error) });
        if (this.owners.get(channel) !== registration) {
          this.log.info('SUBSCRIPTION_RESUBSCRIBE_SUPERSEDED', { channel });
          continue;
        }
        this.recordFailure(channel, registration, this.callbacks.get(channel) ?? callback, error);
        this.forget(channel);
        report.failed.push(channel);
        continue;
      }

      // Released meanwhile: release already sent the unsubscribe, and any newer
      // registration runs its own subscribe.
      if (this.owners.get(channel) !== registration) {
        this.log.info('SUBSCRIPTION_RESUBSCRIBE_SUPERSEDED', { channel });
        continue;
      }
      report.recovered.push(channel);
    }

    if (report.failed.length > 0) {
      this.scheduleRetry();
    }
    return report;
  }

  /** Re-acquires channels whose subscribe failed, for every owner recorded at failure time. */
  async retryFailed(): Promise<RecoveryReport> {
    const report: RecoveryReport = { recovered: [], failed: [] };
    if (this.disposed) {
      return report;
    }

    const entries = [...this.failed.entries()].map(
      ([channel, entry]) => [channel, { ...entry, owners: new Set(entry.owners) }] as const
    );
    if (entries.length > 0) {
      this.log.info('SUBSCRIPTIONS_RETRYING', { count: entries.length });
    }

    for (const [channel, entry] of entries) {
      if (this.disposed) {
        return report;
      }
      // Owners may have been released since the snapshot.
      const current = this.failed.get(channel);
      if (!current || current.owners.size === 0) {
        this.failed.delete(channel);
        continue;
      }
      const owners = [...current.owners].filter((owner) => entry.owners.has(owner));
      this.failed.delete(channel);
      if (owners.length === 0) {
        continue;
      }

      try {
        await this.acquireOwners(channel, owners, entry.callback);
        report.recovered.push(channel);
        this.log.info('SUBSCRIPTION_RETRY_SUCCEEDED', { channel, owners: owners.length });
      } catch (error) {
        if (error instanceof SubscriptionCancelledError) {
          return report;
        }
        if (error instanceof ProgrammingInvariantError) {
          this.log.error('SUBSCRIPTION_RETRY_DROPPED', { channel, error: errorMessage(error) });
        } else {
          this.log.warn('SUBSCRIPTION_RETRY_FAILED', { channel, error: errorMessage(error) });
        }
        report.failed.push(channel);
      }
    }

    if (this.failed.size === 0) {
      this.retryBackoffMs = this.retry.minBackoffMs;
    }
    return report;
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }

    const channels = [...this.active];
    for (const [channel, entry] of this.pending) {
      entry.cancel(new SubscriptionCancelledError(channel));
    }
    for (const queue of this.queues.values()) {
      queue.close();
    }
    this.pending.clear();
    this.owners.clear();
    this.callbacks.clear();
    this.failed.clear();
    this.active.clear();
    this.queues.clear();

    for (const channel of channels) {
      await this.safeUnsubscribe(channel, 'disposed');
    }
  }

  ownersOf(channel: string): string[] {
    return [...(this.owners.get(channel) ?? [])].sort();
  }

  isSubscribed(channel: string): boolean {
    return this.active.has(channel);
  }

  activeChannels(): string[] {
    return [...this.active].sort();
  }

  pendingChannels(): string[] {
    return [...this.pending.keys()].sort();
  }

  failedChannels(): string[] {
    return [...this.failed.keys()].sort();
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  private async acquireOwners(channel: string, ownersToAdd: string[], callback: ChannelCallback): Promise<void> {
    if (this.disposed) {
      throw new SubscriptionCancelledError(channel);
    }

    const inFlight = this.pending.get(channel);
    const owners = this.owners.get(channel);

    // Co-owners must share one callback. Checked before any mutation so a
    // mismatch leaves no partial state.
    const existing = this.callbacks.get(channel);
    if (owners && owners.size > 0 && existing && existing !== callback) {
      throw new ProgrammingInvariantError(
        'callback_mismatch',
        `callback_mismatch:${channel}: owners [${ownersToAdd.join(', ')}] passed a different callback than the one on record`,
        { channel, owners: ownersToAdd }
      );
    }

    if (owners) {
      // Every owner left during the pending subscribe; the new one takes it over.
      if (owners.size === 0) {
        this.callbacks.set(channel, callback);
      }
      for (const owner of ownersToAdd) {
        owners.add(owner);
      }
      if (inFlight) {
        await inFlight.promise;
      }
      return;
    }

    this.owners.set(channel, new Set(ownersToAdd));
    this.callbacks.set(channel, callback);
    const attempt = this.startSubscribe(channel);
    this.pending.set(channel, attempt);
    await attempt.promise;
  }

  private startSubscribe(channel: string): PendingSubscribe {
    const entry: PendingSubscribe = { promise: Promise.resolve(), cancel: () => undefined };
    entry.promise = new Promise<void>((resolve, reject) => {
      entry.cancel = reject;
      let call: Promise<void>;
      try {
        call = this.bus.subscribe(channel, this.dispatcherFor(channel));
      } catch (error) {
        call = Promise.reject(error);
      }
      call.then(
        () => this.completeSubscribe(channel, entry).then(resolve, reject),
        (error: unknown) => reject(this.failSubscribe(channel, entry, error))
      );
    });
    return entry;
  }

  private async completeSubscribe(channel: string, entry: PendingSubscribe): Promise<void> {
    if (this.pending.get(channel) === entry) {
      this.pending.delete(channel);
    }

    if (this.disposed) {
      this.log.info('SUBSCRIPTION_DISCARDED_AFTER_DISPOSE', { channel });
      await this.safeUnsubscribe(channel, 'disposed_during_subscribe');
      throw new SubscriptionCancelledError(channel);
    }

    const owners = this.owners.get(channel);
    if (owners && owners.size > 0) {
      this.active.add(channel);
      this.log.debug('SUBSCRIPTION_ACTIVE', { channel, owners: [...owners] });
      return;
    }

    this.log.info('SUBSCRIPTION_ORPHANED', { channel });
    this.forget(channel);
    await this.safeUnsubscribe(channel, 'orphaned');
  }

  private failSubscribe(channel: string, entry: PendingSubscribe, error: unknown): OrderEntryError {
    if (this.pending.get(channel) === entry) {
      this.pending.delete(channel);
    }
    const failure =
      error instanceof OrderEntryError
        ? error
        : new TransientIOError('subscribe_failed', `subscribe_failed:${channel}: ${errorMessage(error)}`, { channel });

    if (this.disposed) {
      return failure;
    }

    const owners = this.owners.get(channel);
    const callback = this.callbacks.get(channel);
    this.log.warn('SUBSCRIPTION_FAILED', {
      channel,
      owners: owners ? [...owners] : [],
      error: errorMessage(error),
    });
    if (owners && owners.size > 0 && callback) {
      this.recordFailure(channel, owners, callback, error);
    }
    this.forget(channel);
    this.scheduleRetry();
    return failure;
  }

  private recordFailure(channel: string, owners: Set<string>, callback: ChannelCallback, error: unknown): void {
    const previous = this.failed.get(channel);
    const merged = new Set(owners);
    if (previous && previous.callback === callback) {
      for (const owner of previous.owners) {
        merged.add(owner);
      }
    }
    this.failed.set(channel, { owners: merged, callback, error: errorMessage(error) });
  }

  private forget(channel: string): void {
    this.owners.delete(channel);
    this.callbacks.delete(channel);
    this.active.delete(channel);
    const queue = this.queues.get(channel);
    if (queue) {
      queue.close();
      this.queues.delete(channel);
    }
  }

  private dispatcherFor(channel: string): BusMessageHandler {
    return (payload: unknown) => {
      if (this.disposed || !this.callbacks.has(channel)) {
        return;
      }
      return this.queueFor(channel).enqueue(payload);
    };
  }

  private queueFor(channel: string): ChannelEventQueue {
    let queue = this.queues.get(channel);
    if (!queue) {
      queue = new ChannelEventQueue(
        channel,
        (event) => {
          const callback = this.callbacks.get(channel);
          return callback ? callback(event) : undefined;
        },
        this.log
      );
      this.queues.set(channel, queue);
    }
    return queue;
  }

  private async safeUnsubscribe(channel: string, reason: string): Promise<void> {
    try {
      await this.bus.unsubscribe(channel);
      this.log.debug('SUBSCRIPTION_RELEASED', { channel, reason });
    } catch (error) {
      this.log.warn('SUBSCRIPTION_UNSUBSCRIBE_FAILED', { channel, reason, error: errorMessage(error) });
    }
  }

  private scheduleRetry(): void {
    if (!this.retry.enabled || this.disposed || this.retryTimer || this.failed.size === 0) {
      return;
    }
    const delayMs = this.retryBackoffMs;
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      void this.runScheduledRetry();
    }, delayMs);
    this.log.debug('SUBSCRIPTION_RETRY_SCHEDULED', { delayMs, channels: this.failedChannels() });
  }

  private async runScheduledRetry(): Promise<void> {
    try {
      await this.retryFailed();
    } catch (error) {
      this.log.error('SUBSCRIPTION_RETRY_CRASHED', { error: errorMessage(error) });
    }
    if (this.failed.size > 0) {
      this.retryBackoffMs = Math.min(this.retryBackoffMs * 2, this.retry.maxBackoffMs);
      this.scheduleRetry();
    }
  }
}
