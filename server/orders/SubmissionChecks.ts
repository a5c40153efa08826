import Decimal from 'decimal.js';
import type { ConnectionStateName } from '../bus/types';
import type { MarketView } from '../market/MarketDataStore';
import type { SafetyVerdict } from '../safety/SafetyStateTracker';
import { FieldSnapshot, StalenessField, StalenessPolicy } from '../safety/StalenessPolicy';
import { effectivePrice } from './EffectivePrice';
import { validateForm } from './form';
import {
  ExposureBreakdown,
  buyingPowerImpact,
  checkLimits,
  currentPositionFor,
  projectExposure,
  proposedPosition,
} from './LimitChecks';
import type { BlockReason, BuyingPowerImpact, OrderDraft, OrderForm } from './types';

export interface SafetyView {
  initialized: boolean;
  verdict: SafetyVerdict;
}

export interface ConnectionView {
  state: ConnectionStateName;
  readWrite: boolean;
}

export interface CheckContext {
  draft: OrderDraft;
  safety: SafetyView;
  connection: ConnectionView;
  market: MarketView;
  policy: StalenessPolicy;
  now: Date;
}

export interface OrderEvaluation {
  form: OrderForm;
  effectivePrice: Decimal;
  notional: Decimal;
  currentPosition: Decimal;
  proposedPosition: Decimal;
  exposure: ExposureBreakdown;
  impact: BuyingPowerImpact;
}

export type CheckOutcome = { ok: true; evaluation: OrderEvaluation } | { ok: false; block: BlockReason };

const FIELD_LABELS: Record<StalenessField, string> = {
  position: 'Position data',
  price: 'Price data',
  buyingPower: 'Buying power data',
  riskLimits: 'Risk limits',
};

const FIELD_CODES: Record<StalenessField, string> = {
  position: 'position_stale',
  price: 'price_stale',
  buyingPower: 'buying_power_stale',
  riskLimits: 'risk_limits_stale',
};

/** Safety loaded, connection read-write, kill switch and circuit breaker clear. */
export function checkTradingGate(safety: SafetyView, connection: ConnectionView): BlockReason | null {
  if (!safety.initialized) {
    return { category: 'safety', code: 'safety_loading', reason: 'Safety state loading', verification: 'unverified' };
  }
  if (!connection.readWrite) {
    return {
      category: 'connection',
      code: 'connection_read_only',
      reason: `Connection: ${connection.state}`,
      verification: 'unverified',
    };
  }
  if (!safety.verdict.allowed) {
    const blockedBy = safety.verdict.blockedBy;
    return {
      category: 'safety',
      code: `${blockedBy.kind}_${blockedBy.verification === 'unverified' ? 'unverified' : 'blocked'}`,
      reason: safety.verdict.reason,
      verification: blockedBy.verification,
    };
  }
  return null;
}

function staleBlock<T>(
  field: StalenessField,
  snapshot: FieldSnapshot<T>,
  policy: StalenessPolicy,
  now: Date
): BlockReason | null {
  if (policy.usable(field, snapshot, now) !== null) {
    return null;
  }
  return {
    category: 'staleness',
    code: FIELD_CODES[field],
    reason: `${FIELD_LABELS[field]} stale: ${policy.describe(field, snapshot, now)}`,
    verification: 'unverified',
  };
}

/**
 * Every check an order has to pass, in order: trading gate, form, freshness
 * of position, price and buying power, risk limits loaded and fresh, then
 * position, notional and exposure limits at the effective price. The first
 * failure wins.
 */
export function evaluateOrder(ctx: CheckContext): CheckOutcome {
  const { market, policy, now } = ctx;

  const gate = checkTradingGate(ctx.safety, ctx.connection);
  if (gate) {
    return { ok: false, block: gate };
  }

  const validated = validateForm(ctx.draft);
  if (!validated.ok) {
    return validated;
  }
  const form = validated.form;

  const freshness =
    staleBlock('position', market.positions, policy, now) ??
    staleBlock('price', market.lastPrice, policy, now) ??
    staleBlock('buyingPower', market.buyingPower, policy, now);
  if (freshness) {
    return { ok: false, block: freshness };
  }

  if (market.riskLimits.observedAt === null) {
    return {
      ok: false,
      block: { category: 'staleness', code: 'risk_limits_loading', reason: 'Risk limits loading', verification: 'unverified' },
    };
  }
  const limitsStale = staleBlock('riskLimits', market.riskLimits, policy, now);
  if (limitsStale) {
    return { ok: false, block: limitsStale };
  }

  const positions = policy.usable('position', market.positions, now);
  const lastPrice = policy.usable('price', market.lastPrice, now);
  const buyingPower = policy.usable('buyingPower', market.buyingPower, now);
  const limits = policy.usable('riskLimits', market.riskLimits, now);
  if (!positions || !buyingPower || !limits) {
    // Unreachable after the freshness checks above; kept so the types narrow.
    return {
      ok: false,
      block: { category: 'staleness', code: 'data_unavailable', reason: 'Market data unavailable', verification: 'unverified' },
    };
  }

  const price = effectivePrice(form, lastPrice);
  if (!price) {
    return {
      ok: false,
      block: {
        category: 'limits',
        code: 'effective_price_unavailable',
        reason: 'Cannot determine order price for limit checks',
        verification: 'unverified',
      },
    };
  }

  const violation = checkLimits({ form, positions, limits, effectivePrice: price });
  if (violation) {
    return { ok: false, block: violation };
  }

  const current = currentPositionFor(positions, form.symbol);
  const proposed = proposedPosition(current, form.side, form.qty);
  const notional = form.qty.times(price);
  return {
    ok: true,
    evaluation: {
      form,
      effectivePrice: price,
      notional,
      currentPosition: current,
      proposedPosition: proposed,
      exposure: projectExposure(positions, form.symbol, proposed, price),
      impact: buyingPowerImpact(notional, buyingPower),
    },
  };
}
