import { decodeJsonRecord, parseIsoTimestamp, pickField } from '../utils/parse';

export type SafetyKind = 'kill_switch' | 'circuit_breaker';
export type SafetyCondition = 'SAFE' | 'UNSAFE' | 'TRANSITIONAL';
/** `confirmed`: the source said so. `unverified`: we could not find out. */
export type SafetyVerification = 'confirmed' | 'unverified';
export type SafetySource = 'initial' | 'push' | 'fetch';

export interface SafetyState {
  kind: SafetyKind;
  state: SafetyCondition;
  /** Time of the transition into the current state (disengagedAt / resetAt for SAFE). */
  changedAt: Date | null;
  /** Time of the previous transition (engagedAt / trippedAt). */
  priorChangedAt: Date | null;
  reason: string | null;
  verification: SafetyVerification;
  source: SafetySource;
}

export type SafetyParseResult = { ok: true; state: SafetyState } | { ok: false; error: string };

export const SAFETY_CHANNELS: Record<SafetyKind, string> = {
  kill_switch: 'kill_switch:state',
  circuit_breaker: 'circuit_breaker:state',
};

export const SAFETY_LABELS: Record<SafetyKind, string> = {
  kill_switch: 'Kill switch',
  circuit_breaker: 'Circuit breaker',
};

interface KindSchema {
  safe: string;
  unsafe: string;
  transitional: string | null;
  changedAtKeys: string[];
  priorChangedAtKeys: string[];
  reasonKeys: string[];
}

const SCHEMAS: Record<SafetyKind, KindSchema> = {
  kill_switch: {
    safe: 'ACTIVE',
    unsafe: 'ENGAGED',
    transitional: null,
    changedAtKeys: ['disengagedAt', 'disengaged_at'],
    priorChangedAtKeys: ['engagedAt', 'engaged_at'],
    reasonKeys: ['reason', 'engagement_reason'],
  },
  circuit_breaker: {
    safe: 'OPEN',
    unsafe: 'TRIPPED',
    transitional: 'QUIET_PERIOD',
    changedAtKeys: ['resetAt', 'reset_at'],
    priorChangedAtKeys: ['trippedAt', 'tripped_at'],
    reasonKeys: ['reason', 'trip_reason'],
  },
};

export function isBlocking(state: SafetyState): boolean {
  return state.state !== 'SAFE';
}

export function unsafeState(
  kind: SafetyKind,
  reason: string,
  verification: SafetyVerification,
  source: SafetySource
): SafetyState {
  return {
    kind,
    state: 'UNSAFE',
    changedAt: null,
    priorChangedAt: null,
    reason,
    verification,
    source,
  };
}

export function loadingState(kind: SafetyKind): SafetyState {
  return unsafeState(kind, 'Safety state loading', 'unverified', 'initial');
}

/** `present` distinguishes an absent key (or null) from a present-but-unparseable one. */
function readTimestamp(record: Record<string, unknown>, keys: string[]): { present: boolean; value: Date | null } {
  const raw = pickField(record, ...keys);
  if (raw === undefined || raw === null) {
    return { present: false, value: null };
  }
  return { present: true, value: parseIsoTimestamp(raw) };
}

function readReason(record: Record<string, unknown>, keys: string[]): string | null {
  const raw = pickField(record, ...keys);
  if (raw === undefined || raw === null) {
    return null;
  }
  const text = String(raw).trim();
  return text ? text : null;
}

/**
 * Parses a kill-switch or circuit-breaker payload into a typed state.
 *
 * SAFE requires a valid transition timestamp, or no timestamps at all (a
 * switch that never changed). Every present timestamp must parse, and a
 * SAFE transition may not predate the transition it claims to undo.
 */
export function parseSafetyState(kind: SafetyKind, raw: unknown, source: SafetySource = 'push'): SafetyParseResult {
  const decoded = decodeJsonRecord(raw);
  if (!decoded.ok) {
    return { ok: false, error: decoded.error };
  }
  const record = decoded.value;
  const schema = SCHEMAS[kind];

  const rawState = record.state;
  if (typeof rawState !== 'string') {
    return { ok: false, error: 'missing state' };
  }
  const stateName = rawState.trim().toUpperCase();

  const changed = readTimestamp(record, schema.changedAtKeys);
  const prior = readTimestamp(record, schema.priorChangedAtKeys);
  if (changed.present && !changed.value) {
    return { ok: false, error: `invalid ${schema.changedAtKeys[0]}` };
  }
  if (prior.present && !prior.value) {
    return { ok: false, error: `invalid ${schema.priorChangedAtKeys[0]}` };
  }
  const reason = readReason(record, schema.reasonKeys);

  if (stateName === schema.safe) {
    if (!changed.value && prior.value) {
      return {
        ok: false,
        error: `${stateName} with ${schema.priorChangedAtKeys[0]} but no ${schema.changedAtKeys[0]}`,
      };
    }
    if (changed.value && prior.value && changed.value.getTime() < prior.value.getTime()) {
      return {
        ok: false,
        error: `${schema.changedAtKeys[0]} precedes ${schema.priorChangedAtKeys[0]}`,
      };
    }
    return {
      ok: true,
      state: {
        kind,
        state: 'SAFE',
        changedAt: changed.value,
        priorChangedAt: prior.value,
        reason: null,
        verification: 'confirmed',
        source,
      },
    };
  }

  if (stateName === schema.unsafe) {
    return {
      ok: true,
      state: {
        kind,
        state: 'UNSAFE',
        changedAt: prior.value,
        priorChangedAt: changed.value,
        reason: reason ?? `${SAFETY_LABELS[kind]} ${stateName.toLowerCase()}`,
        verification: 'confirmed',
        source,
      },
    };
  }

  if (schema.transitional && stateName === schema.transitional) {
    return {
      ok: true,
      state: {
        kind,
        state: 'TRANSITIONAL',
        changedAt: changed.value,
        priorChangedAt: prior.value,
        reason: `${SAFETY_LABELS[kind]} in quiet period`,
        verification: 'confirmed',
        source,
      },
    };
  }

  return { ok: false, error: `unknown state ${JSON.stringify(rawState)}` };
}

/** Block reason for a non-SAFE state, worded by whether it was confirmed or unverifiable. */
export function describeBlock(state: SafetyState): string {
  const label = SAFETY_LABELS[state.kind];
  if (state.verification === 'unverified') {
    return `Unable to verify ${label.toLowerCase()}: ${state.reason ?? 'unknown'}`;
  }
  if (state.state === 'TRANSITIONAL') {
    return `${label} in quiet period`;
  }
  return `${label}: ${state.reason ?? 'trading halted'}`;
}
