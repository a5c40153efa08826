import type { OrderAck } from '../api/payloads';
import type { TradingApi } from '../api/TradingApiClient';
import { ValidationError, errorMessage } from '../errors/OrderEntryError';
import type { MarketDataStore, MarketView } from '../market/MarketDataStore';
import type { SafetyState } from '../safety/SafetyState';
import { type SafetyStateTracker, evaluateSafety } from '../safety/SafetyStateTracker';
import { StalenessPolicy, emptySnapshot, snapshotOf } from '../safety/StalenessPolicy';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { EMPTY_DRAFT, normalizeDraft } from './form';
import type { IntentManager } from './IntentManager';
import { CheckOutcome, ConnectionView, checkTradingGate, evaluateOrder } from './SubmissionChecks';
import {
  BlockReason,
  ConfirmResult,
  OrderDraft,
  OrderForm,
  OrderFormInput,
  OrderIntent,
  PipelineState,
  PreviewResult,
  SerializedDraft,
  sameForm,
  serializeDraft,
  toOrderRequest,
} from './types';

export const ACCEPTED_ORDER_STATUSES: ReadonlySet<string> = new Set(['pending_new', 'new', 'accepted']);

const DEFAULT_CONFIRM_FETCH_TIMEOUT_MS = 2_000;

export interface PipelineSnapshot {
  state: PipelineState;
  form: SerializedDraft;
  intentId: string | null;
  block: BlockReason | null;
}

export interface OrderSubmissionPipelineDeps {
  api: Pick<TradingApi, 'fetchPositions' | 'fetchAccount' | 'fetchRiskLimits' | 'fetchQuote' | 'submitOrder'>;
  safety: SafetyStateTracker;
  market: MarketDataStore;
  intents: IntentManager;
  policy: StalenessPolicy;
  connection: () => ConnectionView;
  now?: () => Date;
  log?: Logger;
  confirmFetchTimeoutMs?: number;
  onStateChange?: (snapshot: PipelineSnapshot) => void;
}

function block(category: BlockReason['category'], code: string, reason: string, verification: BlockReason['verification']): BlockReason {
  return { category, code, reason, verification };
}

/**
 * DRAFTING → PREVIEWING → CONFIRMING → SUBMITTED | REJECTED | ABORTED.
 *
 * Preview runs every check against cached data without touching the network.
 * Confirm re-fetches everything, re-runs every check, and re-reads the live
 * kill switch, circuit breaker and connection right before the order goes out.
 */
export class OrderSubmissionPipeline {
  private state: PipelineState = 'DRAFTING';
  private draft: OrderDraft = EMPTY_DRAFT;
  private previewed: OrderForm | null = null;
  private lastBlock: BlockReason | null = null;
  private readonly lifetime = new AbortController();
  private readonly now: () => Date;
  private readonly log: Logger;
  private readonly confirmFetchTimeoutMs: number;

  constructor(private readonly deps: OrderSubmissionPipelineDeps) {
    this.now = deps.now ?? (() => new Date());
    this.log = deps.log ?? defaultLogger;
    this.confirmFetchTimeoutMs = Math.max(1, deps.confirmFetchTimeoutMs || DEFAULT_CONFIRM_FETCH_TIMEOUT_MS);
  }

  getState(): PipelineState {
    return this.state;
  }

  getDraft(): OrderDraft {
    return this.draft;
  }

  snapshot(): PipelineSnapshot {
    return {
      state: this.state,
      form: serializeDraft(this.draft),
      intentId: this.deps.intents.current()?.intentId ?? null,
      block: this.lastBlock,
    };
  }

  /** Cached verdict for the current draft, as preview would compute it. */
  check(): CheckOutcome {
    return evaluateOrder({
      draft: this.draft,
      safety: { initialized: this.deps.safety.isInitialized(), verdict: this.deps.safety.evaluate() },
      connection: this.deps.connection(),
      market: this.deps.market.view(this.draft.symbol),
      policy: this.deps.policy,
      now: this.now(),
    });
  }

  async updateForm(input: OrderFormInput): Promise<OrderDraft> {
    this.assertNotConfirming();
    const next = normalizeDraft(input, this.draft);
    const changed = !sameForm(next, this.draft);
    this.draft = next;
    await this.deps.intents.invalidateIfChanged(next);

    if (changed || this.state !== 'PREVIEWING') {
      this.previewed = null;
      this.lastBlock = null;
      this.setState('DRAFTING');
    }
    return next;
  }

  /** Applies the coordinator's selection to the draft. */
  async selectSymbol(symbol: string | null): Promise<void> {
    if (this.state === 'CONFIRMING' || symbol === this.draft.symbol) {
      return;
    }
    await this.updateForm({ symbol });
  }

  async preview(): Promise<PreviewResult> {
    this.assertNotConfirming();
    const outcome = this.check();
    if (!outcome.ok) {
      return this.abortPreview(outcome.block);
    }

    const { evaluation } = outcome;
    const { intent, reused } = await this.deps.intents.obtain(evaluation.form);
    if (!sameForm(this.draft, evaluation.form)) {
      return this.abortPreview(
        block('form', 'form_changed', 'Order details changed. Please preview again.', 'confirmed')
      );
    }

    this.previewed = evaluation.form;
    this.lastBlock = null;
    this.setState('PREVIEWING');
    this.log.info('ORDER_PREVIEWED', {
      intentId: intent.intentId,
      reused,
      symbol: evaluation.form.symbol,
      side: evaluation.form.side,
      qty: evaluation.form.qty.toString(),
      effectivePrice: evaluation.effectivePrice.toString(),
      impactWarning: evaluation.impact.warning,
    });

    return {
      ok: true,
      preview: {
        intentId: intent.intentId,
        form: evaluation.form,
        effectivePrice: evaluation.effectivePrice,
        notional: evaluation.notional,
        currentPosition: evaluation.currentPosition,
        proposedPosition: evaluation.proposedPosition,
        impact: evaluation.impact,
      },
    };
  }

  cancelPreview(): void {
    if (this.state !== 'PREVIEWING') {
      return;
    }
    this.previewed = null;
    this.setState('DRAFTING');
  }

  async confirm(): Promise<ConfirmResult> {
    if (this.state === 'CONFIRMING') {
      return {
        ok: false,
        state: 'ABORTED',
        block: block('submission', 'confirm_in_progress', 'Order confirmation already in progress', 'confirmed'),
        intentId: this.deps.intents.current()?.intentId ?? null,
      };
    }

    const form = this.previewed;
    if (this.state !== 'PREVIEWING' || !form) {
      return this.abortConfirm(block('form', 'not_previewed', 'Preview the order before confirming', 'confirmed'), null);
    }
    if (!sameForm(this.draft, form)) {
      return this.abortConfirm(
        block('form', 'form_changed', 'Order details changed. Please close and preview again.', 'confirmed'),
        null
      );
    }
    const intent = this.deps.intents.current();
    if (!intent || !sameForm(intent.formSnapshot, form)) {
      return this.abortConfirm(
        block('form', 'intent_missing', 'Order intent expired. Please preview again.', 'confirmed'),
        null
      );
    }

    this.setState('CONFIRMING');
    this.log.info('ORDER_CONFIRM_STARTED', { intentId: intent.intentId, symbol: form.symbol });

    const fresh = await this.fetchFreshView(form.symbol);
    if (this.lifetime.signal.aborted) {
      return this.abortConfirm(block('submission', 'disposed', 'Order entry session closed', 'unverified'), intent);
    }

    const outcome = evaluateOrder({
      draft: form,
      safety: { initialized: true, verdict: evaluateSafety(fresh.safety) },
      connection: this.deps.connection(),
      market: fresh.market,
      policy: this.deps.policy,
      now: this.now(),
    });
    if (!outcome.ok) {
      return this.abortConfirm(outcome.block, intent);
    }

    // Last look at live state before dispatch.
    const gate = checkTradingGate(
      { initialized: this.deps.safety.isInitialized(), verdict: this.deps.safety.evaluate() },
      this.deps.connection()
    );
    if (gate) {
      return this.abortConfirm(gate, intent);
    }

    return this.submit(form, intent);
  }

  /** Recovers the session's persisted intent, if any, as the current draft. */
  async restore(): Promise<OrderIntent | null> {
    const intent = await this.deps.intents.restore();
    if (intent) {
      this.draft = intent.formSnapshot;
      this.previewed = null;
      this.setState('DRAFTING');
    }
    return intent;
  }

  dispose(): void {
    this.lifetime.abort();
  }

  private async submit(form: OrderForm, intent: OrderIntent): Promise<ConfirmResult> {
    let ack: OrderAck;
    try {
      ack = await this.deps.api.submitOrder(toOrderRequest(form, intent.intentId), this.lifetime.signal);
    } catch (error) {
      // The intent survives so a retry reuses the same idempotency key.
      this.log.error('ORDER_SUBMIT_FAILED', { intentId: intent.intentId, error: errorMessage(error) });
      return this.finishRejected(
        block('submission', 'submission_failed', `Order failed: ${errorMessage(error)}`, 'unverified'),
        intent
      );
    }

    if (!ACCEPTED_ORDER_STATUSES.has(ack.status)) {
      this.log.warn('ORDER_REJECTED', { intentId: intent.intentId, status: ack.status, message: ack.message });
      await this.deps.intents.discard('rejected');
      return this.finishRejected(
        block('submission', 'order_rejected', `Order failed: ${ack.message ?? 'Unknown error'}`, 'confirmed'),
        intent
      );
    }

    this.log.info('ORDER_SUBMITTED', {
      intentId: intent.intentId,
      orderId: ack.orderId,
      status: ack.status,
      symbol: form.symbol,
    });
    await this.deps.intents.discard('submitted');
    this.previewed = null;
    this.lastBlock = null;
    this.draft = { ...EMPTY_DRAFT, symbol: form.symbol };
    this.setState('SUBMITTED');
    return { ok: true, state: 'SUBMITTED', intentId: intent.intentId, orderId: ack.orderId, status: ack.status };
  }

  private async fetchFreshView(
    symbol: string
  ): Promise<{ market: MarketView; safety: SafetyState[] }> {
    const { api, market } = this.deps;
    const [positions, quote, account, limits, safety] = await Promise.all([
      this.fetchBounded('positions', (signal) => api.fetchPositions(signal)),
      this.fetchBounded('quote', (signal) => api.fetchQuote(symbol, signal)),
      this.fetchBounded('account', (signal) => api.fetchAccount(signal)),
      this.fetchBounded('risk_limits', (signal) => api.fetchRiskLimits(signal)),
      this.deps.safety.refreshAll('submission'),
    ]);

    // Fresh reads also refresh the cache the next preview will use.
    if (positions) market.setPositions(positions);
    if (quote) market.setPrice({ symbol, price: quote.last, timestamp: quote.timestamp });
    if (account) market.setBuyingPower(account);
    if (limits) market.setRiskLimits(limits);

    const view: MarketView = {
      positions: positions ? snapshotOf(positions.positions, positions.timestamp) : emptySnapshot(),
      lastPrice: quote ? snapshotOf(quote.last, quote.timestamp) : emptySnapshot(),
      buyingPower: account ? snapshotOf(account.buyingPower, account.timestamp) : emptySnapshot(),
      riskLimits: limits ? snapshotOf(limits.limits, limits.timestamp) : emptySnapshot(),
    };
    return { market: view, safety };
  }

  private async fetchBounded<T>(label: string, task: (signal: AbortSignal) => Promise<T>): Promise<T | null> {
    try {
      return await withTimeout(`confirm_${label}`, this.confirmFetchTimeoutMs, task, this.lifetime.signal);
    } catch (error) {
      this.log.warn('ORDER_CONFIRM_FETCH_FAILED', { field: label, error: errorMessage(error) });
      return null;
    }
  }

  private abortPreview(reason: BlockReason): PreviewResult {
    this.previewed = null;
    this.lastBlock = reason;
    this.setState('ABORTED');
    this.log.info('ORDER_PREVIEW_BLOCKED', { code: reason.code, reason: reason.reason, verification: reason.verification });
    return { ok: false, block: reason };
  }

  private abortConfirm(reason: BlockReason, intent: OrderIntent | null): ConfirmResult {
    this.previewed = null;
    this.lastBlock = reason;
    this.setState('ABORTED');
    this.log.warn('ORDER_CONFIRM_BLOCKED', {
      intentId: intent?.intentId ?? null,
      code: reason.code,
      reason: reason.reason,
      verification: reason.verification,
    });
    return { ok: false, state: 'ABORTED', block: reason, intentId: intent?.intentId ?? null };
  }

  private finishRejected(reason: BlockReason, intent: OrderIntent): ConfirmResult {
    this.previewed = null;
    this.lastBlock = reason;
    this.setState('REJECTED');
    return { ok: false, state: 'REJECTED', block: reason, intentId: intent.intentId };
  }

  private assertNotConfirming(): void {
    if (this.state === 'CONFIRMING') {
      throw new ValidationError('confirm_in_progress', 'Order confirmation in progress; the form is locked');
    }
  }

  private setState(next: PipelineState): void {
    this.state = next;
    if (!this.deps.onStateChange) {
      return;
    }
    try {
      this.deps.onStateChange(this.snapshot());
    } catch (error) {
      this.log.error('ORDER_STATE_LISTENER_FAILED', { state: next, error: errorMessage(error) });
    }
  }
}
