import Decimal from 'decimal.js';
import { describe, expect, it } from 'vitest';
import { MarketDataStore } from '../market/MarketDataStore';

const at = (iso: string) => new Date(iso);

describe('MarketDataStore', () => {
  it('keeps the newest price and ignores an older update', () => {
    const store = new MarketDataStore();
    expect(store.setPrice({ symbol: 'AAPL', price: new Decimal(187), timestamp: at('2026-03-02T15:00:05Z') })).toBe(true);
    expect(store.setPrice({ symbol: 'AAPL', price: new Decimal(180), timestamp: at('2026-03-02T15:00:01Z') })).toBe(false);

    const snapshot = store.priceSnapshot('AAPL');
    expect(snapshot.value?.toString()).toBe('187');
    expect(snapshot.observedAt?.toISOString()).toBe('2026-03-02T15:00:05.000Z');
  });

  it('accepts an update with the same timestamp', () => {
    const store = new MarketDataStore();
    store.setBuyingPower({ buyingPower: new Decimal(100), timestamp: at('2026-03-02T15:00:00Z') });
    expect(store.setBuyingPower({ buyingPower: new Decimal(90), timestamp: at('2026-03-02T15:00:00Z') })).toBe(true);
    expect(store.view(null).buyingPower.value?.toString()).toBe('90');
  });

  it('invalidates fields so they read as never observed', () => {
    const store = new MarketDataStore();
    store.setPositions({ positions: [], timestamp: at('2026-03-02T15:00:00Z') });
    store.setPrice({ symbol: 'AAPL', price: new Decimal(1), timestamp: at('2026-03-02T15:00:00Z') });

    store.invalidatePositions();
    store.invalidatePrice('AAPL');

    expect(store.positionsSnapshot()).toEqual({ value: null, observedAt: null });
    expect(store.view('AAPL').lastPrice).toEqual({ value: null, observedAt: null });
  });

  it('has no price in the view without a symbol', () => {
    const store = new MarketDataStore();
    store.setPrice({ symbol: 'AAPL', price: new Decimal(1), timestamp: at('2026-03-02T15:00:00Z') });
    expect(store.view(null).lastPrice.value).toBeNull();
  });
});
