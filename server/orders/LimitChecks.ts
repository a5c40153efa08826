import Decimal from 'decimal.js';
import type { PositionRecord, RiskLimits } from '../api/payloads';
import type { BlockReason, BuyingPowerImpact, OrderForm, OrderSide } from './types';

export const IMPACT_WARNING_PERCENT = new Decimal(50);

export interface ExposureBreakdown {
  currentTotal: Decimal;
  currentSymbolNotional: Decimal;
  proposedSymbolNotional: Decimal;
  newTotal: Decimal;
}

export interface LimitCheckInput {
  form: OrderForm;
  positions: PositionRecord[];
  limits: RiskLimits;
  effectivePrice: Decimal;
}

export function currentPositionFor(positions: PositionRecord[], symbol: string): Decimal {
  return positions.find((position) => position.symbol === symbol)?.qty ?? new Decimal(0);
}

export function proposedPosition(current: Decimal, side: OrderSide, qty: Decimal): Decimal {
  return side === 'buy' ? current.plus(qty) : current.minus(qty);
}

/** Σ |qty × currentPrice| over the full position set. */
export function totalExposure(positions: PositionRecord[]): Decimal {
  return positions.reduce((sum, position) => sum.plus(position.qty.times(position.currentPrice).abs()), new Decimal(0));
}

/**
 * `currentSymbolNotional` is taken from the same position set as
 * `currentTotal`, so `newTotal` equals the total recomputed over that set
 * with the symbol's entry replaced by `proposed` at `price`.
 */
export function projectExposure(
  positions: PositionRecord[],
  symbol: string,
  proposed: Decimal,
  price: Decimal
): ExposureBreakdown {
  const currentTotal = totalExposure(positions);
  const record = positions.find((position) => position.symbol === symbol);
  const currentSymbolNotional = record ? record.qty.times(record.currentPrice).abs() : new Decimal(0);
  const proposedSymbolNotional = proposed.times(price).abs();
  return {
    currentTotal,
    currentSymbolNotional,
    proposedSymbolNotional,
    newTotal: currentTotal.minus(currentSymbolNotional).plus(proposedSymbolNotional),
  };
}

function groupThousands(value: Decimal): string {
  return value.toFixed(0).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

function limitBlock(code: string, reason: string): BlockReason {
  return { category: 'limits', code, reason, verification: 'confirmed' };
}

export function checkLimits(input: LimitCheckInput): BlockReason | null {
  const { form, positions, limits, effectivePrice } = input;
  const current = currentPositionFor(positions, form.symbol);
  const proposed = proposedPosition(current, form.side, form.qty);

  if (proposed.abs().gt(limits.maxPositionPerSymbol)) {
    return limitBlock(
      'position_limit',
      `Order exceeds position limit (${limits.maxPositionPerSymbol.toString()} shares)`
    );
  }

  const notional = form.qty.times(effectivePrice);
  if (notional.gt(limits.maxNotionalPerOrder)) {
    return limitBlock('notional_limit', `Order exceeds max notional ($${groupThousands(limits.maxNotionalPerOrder)})`);
  }

  if (limits.maxTotalExposure !== null) {
    const exposure = projectExposure(positions, form.symbol, proposed, effectivePrice);
    if (exposure.newTotal.gt(limits.maxTotalExposure)) {
      return limitBlock(
        'exposure_limit',
        `Order exceeds total exposure limit ($${groupThousands(limits.maxTotalExposure)})`
      );
    }
  }

  return null;
}

export function buyingPowerImpact(notional: Decimal, buyingPower: Decimal): BuyingPowerImpact {
  if (buyingPower.lte(0)) {
    return { notional, percentage: null, remaining: null, warning: true };
  }
  const percentage = notional.div(buyingPower).times(100);
  return {
    notional,
    percentage,
    remaining: buyingPower.minus(notional),
    warning: percentage.gt(IMPACT_WARNING_PERCENT),
  };
}
