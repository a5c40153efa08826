import Decimal from 'decimal.js';
import type { AccountSnapshot, PositionRecord, PositionsSnapshot, PriceTick, RiskLimits, RiskLimitsSnapshot } from '../api/payloads';
import { FieldSnapshot, emptySnapshot, snapshotOf } from '../safety/StalenessPolicy';

export interface MarketView {
  positions: FieldSnapshot<PositionRecord[]>;
  lastPrice: FieldSnapshot<Decimal>;
  buyingPower: FieldSnapshot<Decimal>;
  riskLimits: FieldSnapshot<RiskLimits>;
}

function isOlder<T>(incoming: Date, current: FieldSnapshot<T>): boolean {
  return current.observedAt !== null && incoming.getTime() < current.observedAt.getTime();
}

/**
 * Latest observed value of every field the submission checks read, each
 * stamped with the server time it was observed at. An update older than the
 * value already held is ignored so a slow REST refresh cannot overwrite a
 * newer push.
 */
export class MarketDataStore {
  private positions: FieldSnapshot<PositionRecord[]> = emptySnapshot();
  private readonly prices = new Map<string, FieldSnapshot<Decimal>>();
  private buyingPower: FieldSnapshot<Decimal> = emptySnapshot();
  private riskLimits: FieldSnapshot<RiskLimits> = emptySnapshot();

  setPositions(snapshot: PositionsSnapshot): boolean {
    if (isOlder(snapshot.timestamp, this.positions)) {
      return false;
    }
    this.positions = snapshotOf(snapshot.positions, snapshot.timestamp);
    return true;
  }

  setPrice(tick: Pick<PriceTick, 'symbol' | 'price' | 'timestamp'>): boolean {
    const current = this.prices.get(tick.symbol) ?? emptySnapshot<Decimal>();
    if (isOlder(tick.timestamp, current)) {
      return false;
    }
    this.prices.set(tick.symbol, snapshotOf(tick.price, tick.timestamp));
    return true;
  }

  setBuyingPower(snapshot: AccountSnapshot): boolean {
    if (isOlder(snapshot.timestamp, this.buyingPower)) {
      return false;
    }
    this.buyingPower = snapshotOf(snapshot.buyingPower, snapshot.timestamp);
    return true;
  }

  setRiskLimits(snapshot: RiskLimitsSnapshot): boolean {
    if (isOlder(snapshot.timestamp, this.riskLimits)) {
      return false;
    }
    this.riskLimits = snapshotOf(snapshot.limits, snapshot.timestamp);
    return true;
  }

  invalidatePositions(): void {
    this.positions = emptySnapshot();
  }

  invalidatePrice(symbol: string): void {
    this.prices.delete(symbol);
  }

  invalidateBuyingPower(): void {
    this.buyingPower = emptySnapshot();
  }

  invalidateRiskLimits(): void {
    this.riskLimits = emptySnapshot();
  }

  positionsSnapshot(): FieldSnapshot<PositionRecord[]> {
    return this.positions;
  }

  priceSnapshot(symbol: string): FieldSnapshot<Decimal> {
    return this.prices.get(symbol) ?? emptySnapshot();
  }

  view(symbol: string | null): MarketView {
    return {
      positions: this.positions,
      lastPrice: symbol ? this.priceSnapshot(symbol) : emptySnapshot(),
      buyingPower: this.buyingPower,
      riskLimits: this.riskLimits,
    };
  }
}
