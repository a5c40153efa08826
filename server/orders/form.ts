import Decimal from 'decimal.js';
import { ValidationError } from '../errors/OrderEntryError';
import { normalizeSymbol, parseFiniteDecimal, parsePositiveDecimal } from '../utils/parse';
import {
  BlockReason,
  ORDER_SIDES,
  ORDER_TYPES,
  OrderDraft,
  OrderForm,
  OrderFormInput,
  OrderSide,
  OrderType,
  TIME_IN_FORCE,
  TimeInForce,
} from './types';

export const EMPTY_DRAFT: OrderDraft = {
  symbol: null,
  side: 'buy',
  qty: null,
  orderType: 'market',
  limitPrice: null,
  stopPrice: null,
  timeInForce: 'day',
};

function pickEnum<T extends string>(field: string, value: unknown, allowed: readonly T[], fallback: T): T {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  const normalized = String(value).trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (!match) {
    throw new ValidationError(`invalid_${field}`, `${field} must be one of ${allowed.join(', ')}`, { value });
  }
  return match;
}

function usesLimitPrice(orderType: OrderType): boolean {
  return orderType === 'limit' || orderType === 'stop_limit';
}

function usesStopPrice(orderType: OrderType): boolean {
  return orderType === 'stop' || orderType === 'stop_limit';
}

/**
 * Merges `input` over `base`. Unparseable quantities and prices become null
 * rather than throwing; prices the order type does not use are cleared.
 * Throws ValidationError only for an unknown side, order type or time in force.
 */
export function normalizeDraft(input: OrderFormInput, base: OrderDraft = EMPTY_DRAFT): OrderDraft {
  const side: OrderSide = 'side' in input ? pickEnum('side', input.side, ORDER_SIDES, base.side) : base.side;
  const orderType: OrderType =
    'orderType' in input ? pickEnum('orderType', input.orderType, ORDER_TYPES, base.orderType) : base.orderType;
  const timeInForce: TimeInForce =
    'timeInForce' in input
      ? pickEnum('timeInForce', input.timeInForce, TIME_IN_FORCE, base.timeInForce)
      : base.timeInForce;

  const symbol = 'symbol' in input ? normalizeSymbol(input.symbol) : base.symbol;
  const qty = 'qty' in input ? parseFiniteDecimal(input.qty) : base.qty;
  const limitPrice = 'limitPrice' in input ? parsePositiveDecimal(input.limitPrice) : base.limitPrice;
  const stopPrice = 'stopPrice' in input ? parsePositiveDecimal(input.stopPrice) : base.stopPrice;

  return {
    symbol,
    side,
    qty,
    orderType,
    limitPrice: usesLimitPrice(orderType) ? limitPrice : null,
    stopPrice: usesStopPrice(orderType) ? stopPrice : null,
    timeInForce,
  };
}

function formBlock(code: string, reason: string): { ok: false; block: BlockReason } {
  return { ok: false, block: { category: 'form', code, reason, verification: 'confirmed' } };
}

function usd(value: Decimal): string {
  return `$${value.toFixed(2)}`;
}

export function validateForm(draft: OrderDraft): { ok: true; form: OrderForm } | { ok: false; block: BlockReason } {
  const { symbol, qty } = draft;
  if (!symbol) {
    return formBlock('symbol_required', 'Select a symbol');
  }
  if (!qty) {
    return formBlock('qty_required', 'Enter quantity');
  }
  if (!qty.isInteger() || qty.lte(0)) {
    return formBlock('qty_invalid', 'Quantity must be a positive whole number');
  }

  const { orderType, limitPrice, stopPrice } = draft;
  if (orderType === 'limit' && !limitPrice) {
    return formBlock('limit_price_required', 'Limit orders require a limit price');
  }
  if (orderType === 'stop' && !stopPrice) {
    return formBlock('stop_price_required', 'Stop orders require a stop price');
  }
  if (orderType === 'stop_limit') {
    if (!limitPrice) {
      return formBlock('limit_price_required', 'Stop-limit orders require a limit price');
    }
    if (!stopPrice) {
      return formBlock('stop_price_required', 'Stop-limit orders require a stop price');
    }
    if (draft.side === 'buy' && limitPrice.gt(stopPrice)) {
      return formBlock(
        'stop_limit_price_order',
        `Buy stop-limit: limit (${usd(limitPrice)}) must be at or below stop (${usd(stopPrice)})`
      );
    }
    if (draft.side === 'sell' && limitPrice.lt(stopPrice)) {
      return formBlock(
        'stop_limit_price_order',
        `Sell stop-limit: limit (${usd(limitPrice)}) must be at or above stop (${usd(stopPrice)})`
      );
    }
  }

  return { ok: true, form: { ...draft, symbol, qty } };
}
