import { describe, expect, it } from 'vitest';
import {
  parseAccountPayload,
  parseOrderAck,
  parsePositionsPayload,
  parsePriceTick,
  parseQuotePayload,
  parseRecentFillsPayload,
  parseRiskLimitsPayload,
} from '../api/payloads';

const TS = '2026-03-02T15:00:00Z';

describe('parsePositionsPayload', () => {
  it('parses positions with decimal quantities and prices', () => {
    const result = parsePositionsPayload({
      timestamp: TS,
      positions: [
        { symbol: 'aapl', qty: '100', current_price: '187.25' },
        { symbol: 'MSFT', qty: -20, currentPrice: 410.5, updatedAt: '2026-03-02T14:59:58Z' },
      ],
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.positions.map((p) => [p.symbol, p.qty.toString(), p.currentPrice.toString()])).toEqual([
      ['AAPL', '100', '187.25'],
      ['MSFT', '-20', '410.5'],
    ]);
    expect(result.value.timestamp.toISOString()).toBe('2026-03-02T15:00:00.000Z');
  });

  it('rejects the whole snapshot when one entry is bad', () => {
    const result = parsePositionsPayload({
      timestamp: TS,
      positions: [
        { symbol: 'AAPL', qty: '100', currentPrice: '187.25' },
        { symbol: 'MSFT', qty: 'lots', currentPrice: '410' },
      ],
    });
    expect(result).toEqual({ ok: false, error: 'positions[1] (MSFT) has invalid qty' });
  });

  it('rejects duplicates and a missing timestamp', () => {
    expect(
      parsePositionsPayload({
        timestamp: TS,
        positions: [
          { symbol: 'AAPL', qty: 1, currentPrice: 1 },
          { symbol: 'aapl', qty: 2, currentPrice: 1 },
        ],
      })
    ).toEqual({ ok: false, error: 'duplicate position for AAPL' });
    expect(parsePositionsPayload({ positions: [] })).toEqual({ ok: false, error: 'missing or invalid timestamp' });
  });
});

describe('parsePriceTick', () => {
  it('checks the symbol against the channel', () => {
    const result = parsePriceTick({ symbol: 'MSFT', price: 410, timestamp: TS }, 'AAPL');
    expect(result).toEqual({ ok: false, error: 'symbol MSFT on channel for AAPL' });
  });

  it('rejects non-positive prices', () => {
    expect(parsePriceTick({ symbol: 'AAPL', price: 0, timestamp: TS })).toEqual({
      ok: false,
      error: 'invalid price for AAPL',
    });
  });

  it('accepts server_time as the timestamp', () => {
    const result = parsePriceTick({ symbol: 'AAPL', price: '187.3', server_time: TS, event_type: 'trade' }, 'AAPL');
    expect(result.ok && result.value.price.toString()).toBe('187.3');
    expect(result.ok && result.value.eventType).toBe('trade');
  });
});

describe('parseAccountPayload', () => {
  it('allows zero and negative buying power', () => {
    const result = parseAccountPayload({ buying_power: '-250.00', timestamp: TS });
    expect(result.ok && result.value.buyingPower.toString()).toBe('-250');
  });
});

describe('parseRiskLimitsPayload', () => {
  it('treats null max_total_exposure as no limit', () => {
    const result = parseRiskLimitsPayload({
      max_position_per_symbol: 1000,
      max_notional_per_order: '50000',
      max_total_exposure: null,
      timestamp: TS,
    });
    expect(result.ok && result.value.limits.maxTotalExposure).toBeNull();
  });

  it('requires max_total_exposure to be present', () => {
    const result = parseRiskLimitsPayload({
      max_position_per_symbol: 1000,
      max_notional_per_order: 50000,
      timestamp: TS,
    });
    expect(result).toEqual({ ok: false, error: 'missing max_total_exposure' });
  });
});

describe('parseQuotePayload', () => {
  it('falls back to the requested symbol and the price field', () => {
    const result = parseQuotePayload({ price: 101.5, timestamp: TS }, 'AAPL');
    expect(result.ok && result.value.symbol).toBe('AAPL');
    expect(result.ok && result.value.last.toString()).toBe('101.5');
  });
});

describe('parseRecentFillsPayload', () => {
  it('parses fills and rejects an unknown side', () => {
    const ok = parseRecentFillsPayload({
      timestamp: TS,
      fills: [{ id: 7, symbol: 'AAPL', side: 'BUY', qty: 10, price: '187.1', filled_at: TS }],
    });
    expect(ok.ok && ok.value.fills[0].fillId).toBe('7');
    expect(ok.ok && ok.value.fills[0].side).toBe('buy');

    const bad = parseRecentFillsPayload({
      timestamp: TS,
      fills: [{ id: 'f-1', symbol: 'AAPL', side: 'short', qty: 10, price: 1, filled_at: TS }],
    });
    expect(bad).toEqual({ ok: false, error: 'fills[0] has invalid side' });
  });
});

describe('parseOrderAck', () => {
  it('lowercases the status and reads the message', () => {
    expect(parseOrderAck({ order_id: 'o-1', status: 'PENDING_NEW' })).toEqual({
      ok: true,
      value: { orderId: 'o-1', status: 'pending_new', message: null },
    });
    expect(parseOrderAck({ status: 'rejected', reason: 'insufficient buying power' })).toEqual({
      ok: true,
      value: { orderId: null, status: 'rejected', message: 'insufficient buying power' },
    });
    expect(parseOrderAck({})).toEqual({ ok: false, error: 'missing status' });
  });
});
