import Decimal from 'decimal.js';
import type { SafetyVerification } from '../safety/SafetyState';

export type OrderSide = 'buy' | 'sell';
export type OrderType = 'market' | 'limit' | 'stop' | 'stop_limit';
export type TimeInForce = 'day' | 'gtc' | 'ioc' | 'fok';

export const ORDER_SIDES: readonly OrderSide[] = ['buy', 'sell'];
export const ORDER_TYPES: readonly OrderType[] = ['market', 'limit', 'stop', 'stop_limit'];
export const TIME_IN_FORCE: readonly TimeInForce[] = ['day', 'gtc', 'ioc', 'fok'];

/** What the user typed, before normalisation. */
export interface OrderFormInput {
  symbol?: unknown;
  side?: unknown;
  qty?: unknown;
  orderType?: unknown;
  limitPrice?: unknown;
  stopPrice?: unknown;
  timeInForce?: unknown;
}

/**
 * Normalised draft. A field the user left empty or filled with garbage is
 * null here; the pipeline's form check turns that into a specific reason.
 */
export interface OrderDraft {
  symbol: string | null;
  side: OrderSide;
  qty: Decimal | null;
  orderType: OrderType;
  limitPrice: Decimal | null;
  stopPrice: Decimal | null;
  timeInForce: TimeInForce;
}

/** A draft that passed form validation. */
export interface OrderForm extends OrderDraft {
  symbol: string;
  qty: Decimal;
}

export interface OrderIntent {
  intentId: string;
  formSnapshot: OrderForm;
  createdAt: Date;
}

export type PipelineState = 'DRAFTING' | 'PREVIEWING' | 'CONFIRMING' | 'SUBMITTED' | 'REJECTED' | 'ABORTED';

export type BlockCategory = 'safety' | 'connection' | 'form' | 'staleness' | 'limits' | 'submission';

export interface BlockReason {
  category: BlockCategory;
  code: string;
  reason: string;
  verification: SafetyVerification;
}

export interface BuyingPowerImpact {
  notional: Decimal;
  /** Percent of buying power, null when buying power is zero or negative. */
  percentage: Decimal | null;
  remaining: Decimal | null;
  warning: boolean;
}

export interface OrderPreview {
  intentId: string;
  form: OrderForm;
  effectivePrice: Decimal;
  notional: Decimal;
  currentPosition: Decimal;
  proposedPosition: Decimal;
  impact: BuyingPowerImpact;
}

export type PreviewResult = { ok: true; preview: OrderPreview } | { ok: false; block: BlockReason };

export type ConfirmResult =
  | { ok: true; state: 'SUBMITTED'; intentId: string; orderId: string | null; status: string }
  | { ok: false; state: 'REJECTED' | 'ABORTED'; block: BlockReason; intentId: string | null };

export interface OrderRequest {
  symbol: string;
  side: OrderSide;
  qty: string;
  orderType: OrderType;
  timeInForce: TimeInForce;
  limitPrice: string | null;
  stopPrice: string | null;
  clientOrderId: string;
}

export function formKey(draft: OrderDraft): string {
  return JSON.stringify([
    draft.symbol,
    draft.side,
    draft.qty?.toString() ?? null,
    draft.orderType,
    draft.limitPrice?.toString() ?? null,
    draft.stopPrice?.toString() ?? null,
    draft.timeInForce,
  ]);
}

export function sameForm(a: OrderDraft, b: OrderDraft): boolean {
  return formKey(a) === formKey(b);
}

export function toOrderRequest(form: OrderForm, intentId: string): OrderRequest {
  return {
    symbol: form.symbol,
    side: form.side,
    qty: form.qty.toString(),
    orderType: form.orderType,
    timeInForce: form.timeInForce,
    limitPrice: form.limitPrice?.toString() ?? null,
    stopPrice: form.stopPrice?.toString() ?? null,
    clientOrderId: intentId,
  };
}

export interface SerializedDraft {
  symbol: string | null;
  side: OrderSide;
  qty: string | null;
  orderType: OrderType;
  limitPrice: string | null;
  stopPrice: string | null;
  timeInForce: TimeInForce;
}

export function serializeDraft(draft: OrderDraft): SerializedDraft {
  return {
    symbol: draft.symbol,
    side: draft.side,
    qty: draft.qty?.toString() ?? null,
    orderType: draft.orderType,
    limitPrice: draft.limitPrice?.toString() ?? null,
    stopPrice: draft.stopPrice?.toString() ?? null,
    timeInForce: draft.timeInForce,
  };
}
