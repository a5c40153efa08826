import Decimal from 'decimal.js';
import {
  decodeJsonRecord,
  isRecord,
  normalizeSymbol,
  parseFiniteDecimal,
  parseIsoTimestamp,
  parsePositiveDecimal,
  pickField,
} from '../utils/parse';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface PositionRecord {
  symbol: string;
  qty: Decimal;
  currentPrice: Decimal;
  updatedAt: Date | null;
}

export interface PositionsSnapshot {
  positions: PositionRecord[];
  timestamp: Date;
}

export interface PriceTick {
  symbol: string;
  price: Decimal;
  timestamp: Date;
  eventType: string | null;
}

export interface AccountSnapshot {
  buyingPower: Decimal;
  timestamp: Date;
}

export interface RiskLimits {
  maxPositionPerSymbol: Decimal;
  maxNotionalPerOrder: Decimal;
  /** null: no portfolio exposure limit configured. */
  maxTotalExposure: Decimal | null;
}

export interface RiskLimitsSnapshot {
  limits: RiskLimits;
  timestamp: Date;
}

export interface Quote {
  symbol: string;
  last: Decimal;
  timestamp: Date;
}

export interface Fill {
  fillId: string;
  symbol: string;
  side: 'buy' | 'sell';
  qty: Decimal;
  price: Decimal;
  filledAt: Date;
}

export interface RecentFills {
  fills: Fill[];
  timestamp: Date;
}

export interface OrderAck {
  orderId: string | null;
  status: string;
  message: string | null;
}

function fail<T>(error: string): ParseResult<T> {
  return { ok: false, error };
}

function readTimestamp(record: Record<string, unknown>): Date | null {
  return parseIsoTimestamp(pickField(record, 'timestamp', 'server_time', 'serverTime'));
}

function parsePosition(entry: unknown, index: number): ParseResult<PositionRecord> {
  if (!isRecord(entry)) {
    return fail(`positions[${index}] is not an object`);
  }
  const symbol = normalizeSymbol(entry.symbol);
  if (!symbol) {
    return fail(`positions[${index}] has invalid symbol`);
  }
  const qty = parseFiniteDecimal(entry.qty);
  if (!qty) {
    return fail(`positions[${index}] (${symbol}) has invalid qty`);
  }
  const currentPrice = parseFiniteDecimal(pickField(entry, 'currentPrice', 'current_price'));
  if (!currentPrice || currentPrice.isNegative()) {
    return fail(`positions[${index}] (${symbol}) has invalid currentPrice`);
  }
  const rawUpdatedAt = pickField(entry, 'updatedAt', 'updated_at');
  let updatedAt: Date | null = null;
  if (rawUpdatedAt !== undefined && rawUpdatedAt !== null) {
    updatedAt = parseIsoTimestamp(rawUpdatedAt);
    if (!updatedAt) {
      return fail(`positions[${index}] (${symbol}) has invalid updatedAt`);
    }
  }
  return { ok: true, value: { symbol, qty, currentPrice, updatedAt } };
}

/**
 * `{positions: [...], timestamp}` from the bus or REST. One bad entry rejects
 * the whole snapshot: a partial position set would understate exposure.
 */
export function parsePositionsPayload(raw: unknown): ParseResult<PositionsSnapshot> {
  const decoded = decodeJsonRecord(raw);
  if (!decoded.ok) {
    return fail(decoded.error);
  }
  const timestamp = readTimestamp(decoded.value);
  if (!timestamp) {
    return fail('missing or invalid timestamp');
  }
  const entries = decoded.value.positions;
  if (!Array.isArray(entries)) {
    return fail('positions is not an array');
  }

  const positions: PositionRecord[] = [];
  const seen = new Set<string>();
  for (let i = 0; i < entries.length; i++) {
    const parsed = parsePosition(entries[i], i);
    if (!parsed.ok) {
      return parsed;
    }
    if (seen.has(parsed.value.symbol)) {
      return fail(`duplicate position for ${parsed.value.symbol}`);
    }
    seen.add(parsed.value.symbol);
    positions.push(parsed.value);
  }
  return { ok: true, value: { positions, timestamp } };
}

export function parsePriceTick(raw: unknown, expectedSymbol?: string): ParseResult<PriceTick> {
  const decoded = decodeJsonRecord(raw);
  if (!decoded.ok) {
    return fail(decoded.error);
  }
  const record = decoded.value;
  const symbol = normalizeSymbol(record.symbol);
  if (!symbol) {
    return fail('invalid symbol');
  }
  if (expectedSymbol && symbol !== expectedSymbol) {
    return fail(`symbol ${symbol} on channel for ${expectedSymbol}`);
  }
  const price = parsePositiveDecimal(record.price);
  if (!price) {
    return fail(`invalid price for ${symbol}`);
  }
  const timestamp = readTimestamp(record);
  if (!timestamp) {
    return fail(`missing or invalid timestamp for ${symbol}`);
  }
  const eventType = pickField(record, 'eventType', 'event_type');
  return {
    ok: true,
    value: { symbol, price, timestamp, eventType: typeof eventType === 'string' ? eventType : null },
  };
}

export function parseAccountPayload(raw: unknown): ParseResult<AccountSnapshot> {
  const decoded = decodeJsonRecord(raw);
  if (!decoded.ok) {
    return fail(decoded.error);
  }
  const buyingPower = parseFiniteDecimal(pickField(decoded.value, 'buyingPower', 'buying_power'));
  if (!buyingPower) {
    return fail('invalid buying_power');
  }
  const timestamp = readTimestamp(decoded.value);
  if (!timestamp) {
    return fail('missing or invalid timestamp');
  }
  return { ok: true, value: { buyingPower, timestamp } };
}

/** All three limits must be present; `max_total_exposure` may be null (unlimited) but not absent. */
export function parseRiskLimitsPayload(raw: unknown): ParseResult<RiskLimitsSnapshot> {
  const decoded = decodeJsonRecord(raw);
  if (!decoded.ok) {
    return fail(decoded.error);
  }
  const record = decoded.value;

  const maxPositionPerSymbol = parsePositiveDecimal(pickField(record, 'maxPositionPerSymbol', 'max_position_per_symbol'));
  if (!maxPositionPerSymbol) {
    return fail('invalid max_position_per_symbol');
  }
  const maxNotionalPerOrder = parsePositiveDecimal(pickField(record, 'maxNotionalPerOrder', 'max_notional_per_order'));
  if (!maxNotionalPerOrder) {
    return fail('invalid max_notional_per_order');
  }
  const rawExposure = pickField(record, 'maxTotalExposure', 'max_total_exposure');
  if (rawExposure === undefined) {
    return fail('missing max_total_exposure');
  }
  let maxTotalExposure: Decimal | null = null;
  if (rawExposure !== null) {
    maxTotalExposure = parsePositiveDecimal(rawExposure);
    if (!maxTotalExposure) {
      return fail('invalid max_total_exposure');
    }
  }
  const timestamp = readTimestamp(record);
  if (!timestamp) {
    return fail('missing or invalid timestamp');
  }
  return {
    ok: true,
    value: { limits: { maxPositionPerSymbol, maxNotionalPerOrder, maxTotalExposure }, timestamp },
  };
}

export function parseQuotePayload(raw: unknown, expectedSymbol: string): ParseResult<Quote> {
  const decoded = decodeJsonRecord(raw);
  if (!decoded.ok) {
    return fail(decoded.error);
  }
  const record = decoded.value;
  const symbol = normalizeSymbol(record.symbol) ?? expectedSymbol;
  if (symbol !== expectedSymbol) {
    return fail(`quote for ${symbol}, expected ${expectedSymbol}`);
  }
  const last = parsePositiveDecimal(pickField(record, 'last', 'price'));
  if (!last) {
    return fail(`invalid last price for ${symbol}`);
  }
  const timestamp = readTimestamp(record);
  if (!timestamp) {
    return fail(`missing or invalid timestamp for ${symbol}`);
  }
  return { ok: true, value: { symbol, last, timestamp } };
}

function parseFill(entry: unknown, index: number): ParseResult<Fill> {
  if (!isRecord(entry)) {
    return fail(`fills[${index}] is not an object`);
  }
  const rawId = pickField(entry, 'fillId', 'fill_id', 'id');
  if ((typeof rawId !== 'string' || rawId === '') && typeof rawId !== 'number') {
    return fail(`fills[${index}] has no id`);
  }
  const symbol = normalizeSymbol(entry.symbol);
  if (!symbol) {
    return fail(`fills[${index}] has invalid symbol`);
  }
  const side = typeof entry.side === 'string' ? entry.side.toLowerCase() : '';
  if (side !== 'buy' && side !== 'sell') {
    return fail(`fills[${index}] has invalid side`);
  }
  const qty = parsePositiveDecimal(entry.qty);
  const price = parsePositiveDecimal(entry.price);
  if (!qty || !price) {
    return fail(`fills[${index}] has invalid qty or price`);
  }
  const filledAt = parseIsoTimestamp(pickField(entry, 'filledAt', 'filled_at', 'timestamp'));
  if (!filledAt) {
    return fail(`fills[${index}] has invalid filledAt`);
  }
  return { ok: true, value: { fillId: String(rawId), symbol, side, qty, price, filledAt } };
}

export function parseRecentFillsPayload(raw: unknown): ParseResult<RecentFills> {
  const decoded = decodeJsonRecord(raw);
  if (!decoded.ok) {
    return fail(decoded.error);
  }
  const timestamp = readTimestamp(decoded.value);
  if (!timestamp) {
    return fail('missing or invalid timestamp');
  }
  const entries = decoded.value.fills;
  if (!Array.isArray(entries)) {
    return fail('fills is not an array');
  }
  const fills: Fill[] = [];
  for (let i = 0; i < entries.length; i++) {
    const parsed = parseFill(entries[i], i);
    if (!parsed.ok) {
      return parsed;
    }
    fills.push(parsed.value);
  }
  return { ok: true, value: { fills, timestamp } };
}

export function parseOrderAck(raw: unknown): ParseResult<OrderAck> {
  const decoded = decodeJsonRecord(raw);
  if (!decoded.ok) {
    return fail(decoded.error);
  }
  const record = decoded.value;
  const status = record.status;
  if (typeof status !== 'string' || status.trim() === '') {
    return fail('missing status');
  }
  const rawId = pickField(record, 'orderId', 'order_id', 'client_order_id');
  const message = pickField(record, 'message', 'reason', 'error');
  return {
    ok: true,
    value: {
      orderId: typeof rawId === 'string' || typeof rawId === 'number' ? String(rawId) : null,
      status: status.trim().toLowerCase(),
      message: typeof message === 'string' ? message : null,
    },
  };
}
