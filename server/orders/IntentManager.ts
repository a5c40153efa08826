import { randomUUID } from 'crypto';
import { errorMessage } from '../errors/OrderEntryError';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { isRecord, parseIsoTimestamp } from '../utils/parse';
import { normalizeDraft, validateForm } from './form';
import type { PendingIntentStore, PersistedIntent } from './PendingIntentStore';
import { OrderDraft, OrderForm, OrderIntent, sameForm } from './types';

const INTENT_ID_PATTERN = /^[0-9a-f]{32}$/;

export interface IntentManagerOptions {
  log?: Logger;
  now?: () => Date;
  generateId?: () => string;
}

export function generateIntentId(): string {
  return randomUUID().replace(/-/g, '');
}

function persist(intent: OrderIntent): PersistedIntent {
  const form = intent.formSnapshot;
  return {
    intentId: intent.intentId,
    createdAt: intent.createdAt.toISOString(),
    form: {
      symbol: form.symbol,
      side: form.side,
      qty: form.qty.toString(),
      orderType: form.orderType,
      limitPrice: form.limitPrice?.toString() ?? null,
      stopPrice: form.stopPrice?.toString() ?? null,
      timeInForce: form.timeInForce,
    },
  };
}

/** Parses a stored record; any defect yields an error string. */
export function parsePersistedIntent(raw: unknown): { ok: true; intent: OrderIntent } | { ok: false; error: string } {
  if (!isRecord(raw)) {
    return { ok: false, error: 'record is not an object' };
  }
  const { intentId, createdAt, form } = raw;
  if (typeof intentId !== 'string' || !INTENT_ID_PATTERN.test(intentId)) {
    return { ok: false, error: 'invalid intentId' };
  }
  const created = parseIsoTimestamp(createdAt);
  if (!created) {
    return { ok: false, error: 'invalid createdAt' };
  }
  if (!isRecord(form)) {
    return { ok: false, error: 'form is not an object' };
  }

  let draft: OrderDraft;
  try {
    draft = normalizeDraft({
      symbol: form.symbol,
      side: form.side,
      qty: form.qty,
      orderType: form.orderType,
      limitPrice: form.limitPrice,
      stopPrice: form.stopPrice,
      timeInForce: form.timeInForce,
    });
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
  const validated = validateForm(draft);
  if (!validated.ok) {
    return { ok: false, error: `form: ${validated.block.reason}` };
  }
  return { ok: true, intent: { intentId, formSnapshot: validated.form, createdAt: created } };
}

/**
 * Owns the one pending intent of an order-entry session. The intent ID is the
 * idempotency key sent with the order, so an unmodified form keeps its ID
 * across previews, retries and restarts.
 */
export class IntentManager {
  private intent: OrderIntent | null = null;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly sessionId: string,
    private readonly store: PendingIntentStore,
    options: IntentManagerOptions = {}
  ) {
    this.log = options.log ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? generateIntentId;
  }

  current(): OrderIntent | null {
    return this.intent;
  }

  async obtain(form: OrderForm): Promise<{ intent: OrderIntent; reused: boolean }> {
    if (this.intent && sameForm(this.intent.formSnapshot, form)) {
      return { intent: this.intent, reused: true };
    }

    const previous = this.intent;
    const intent: OrderIntent = { intentId: this.generateId(), formSnapshot: form, createdAt: this.now() };
    this.intent = intent;
    this.log.info('ORDER_INTENT_CREATED', {
      intentId: intent.intentId,
      replaced: previous?.intentId ?? null,
      symbol: form.symbol,
    });

    try {
      await this.store.save(this.sessionId, persist(intent));
    } catch (error) {
      this.log.warn('ORDER_INTENT_PERSIST_FAILED', { intentId: intent.intentId, error: errorMessage(error) });
    }
    return { intent, reused: false };
  }

  /** Drops the intent if `draft` no longer matches it. */
  async invalidateIfChanged(draft: OrderDraft): Promise<boolean> {
    if (!this.intent || sameForm(this.intent.formSnapshot, draft)) {
      return false;
    }
    await this.discard('form_changed');
    return true;
  }

  async discard(reason: string): Promise<void> {
    const intent = this.intent;
    this.intent = null;
    if (intent) {
      this.log.info('ORDER_INTENT_DISCARDED', { intentId: intent.intentId, reason });
    }
    try {
      await this.store.clear(this.sessionId);
    } catch (error) {
      this.log.warn('ORDER_INTENT_CLEAR_FAILED', { reason, error: errorMessage(error) });
    }
  }

  /** Loads a persisted intent. A corrupt record is cleared and reported as nothing to restore. */
  async restore(): Promise<OrderIntent | null> {
    let raw: unknown;
    try {
      raw = await this.store.load(this.sessionId);
    } catch (error) {
      this.log.warn('ORDER_INTENT_LOAD_FAILED', { error: errorMessage(error) });
      return null;
    }
    if (raw === null || raw === undefined) {
      return null;
    }

    const parsed = parsePersistedIntent(raw);
    if (!parsed.ok) {
      this.log.warn('ORDER_INTENT_CORRUPT', { error: parsed.error });
      await this.discard('corrupt_record');
      return null;
    }
    this.intent = parsed.intent;
    this.log.info('ORDER_INTENT_RESTORED', { intentId: parsed.intent.intentId, symbol: parsed.intent.formSnapshot.symbol });
    return parsed.intent;
  }
}
