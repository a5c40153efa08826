import { describe, expect, it } from 'vitest';
import { describeBlock, isBlocking, loadingState, parseSafetyState } from '../safety/SafetyState';

describe('parseSafetyState', () => {
  it('parses an ACTIVE kill switch with consistent timestamps as SAFE', () => {
    const result = parseSafetyState('kill_switch', {
      state: 'ACTIVE',
      engagedAt: '2026-03-02T14:00:00Z',
      disengagedAt: '2026-03-02T14:05:00Z',
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.state.state).toBe('SAFE');
    expect(result.state.verification).toBe('confirmed');
    expect(result.state.changedAt?.toISOString()).toBe('2026-03-02T14:05:00.000Z');
    expect(isBlocking(result.state)).toBe(false);
  });

  it('accepts a kill switch that was never engaged', () => {
    const result = parseSafetyState('kill_switch', { state: 'ACTIVE' });
    expect(result.ok && result.state.state).toBe('SAFE');
  });

  it('rejects ACTIVE with engagedAt but no disengagedAt', () => {
    const result = parseSafetyState('kill_switch', { state: 'ACTIVE', engagedAt: '2026-03-02T14:00:00Z' });
    expect(result).toEqual({ ok: false, error: 'ACTIVE with engagedAt but no disengagedAt' });
  });

  it('rejects a reset that predates the trip', () => {
    const result = parseSafetyState('circuit_breaker', {
      state: 'OPEN',
      tripped_at: '2026-03-02T14:05:00Z',
      reset_at: '2026-03-02T14:00:00Z',
    });
    expect(result).toEqual({ ok: false, error: 'resetAt precedes trippedAt' });
  });

  it('rejects unparseable or zone-less timestamps', () => {
    expect(parseSafetyState('kill_switch', { state: 'ACTIVE', disengagedAt: 'yesterday' })).toEqual({
      ok: false,
      error: 'invalid disengagedAt',
    });
    expect(parseSafetyState('kill_switch', { state: 'ACTIVE', disengagedAt: '2026-03-02T14:00:00' })).toEqual({
      ok: false,
      error: 'invalid disengagedAt',
    });
  });

  it('maps ENGAGED and TRIPPED to UNSAFE with their reasons', () => {
    const engaged = parseSafetyState('kill_switch', { state: 'engaged', reason: 'ops halt' });
    expect(engaged.ok && engaged.state.state).toBe('UNSAFE');
    expect(engaged.ok && describeBlock(engaged.state)).toBe('Kill switch: ops halt');

    const tripped = parseSafetyState('circuit_breaker', { state: 'TRIPPED' });
    expect(tripped.ok && tripped.state.reason).toBe('Circuit breaker tripped');
  });

  it('maps QUIET_PERIOD to TRANSITIONAL', () => {
    const result = parseSafetyState('circuit_breaker', JSON.stringify({ state: 'QUIET_PERIOD' }));
    expect(result.ok && result.state.state).toBe('TRANSITIONAL');
    expect(result.ok && describeBlock(result.state)).toBe('Circuit breaker in quiet period');
  });

  it('fails on unknown states and non-object payloads', () => {
    expect(parseSafetyState('kill_switch', { state: 'MAYBE' })).toEqual({ ok: false, error: 'unknown state "MAYBE"' });
    expect(parseSafetyState('kill_switch', { status: 'ACTIVE' })).toEqual({ ok: false, error: 'missing state' });
    expect(parseSafetyState('kill_switch', '{not json')).toEqual({ ok: false, error: 'invalid JSON' });
    expect(parseSafetyState('kill_switch', [1])).toEqual({ ok: false, error: 'expected object, got array' });
  });
});

describe('loadingState', () => {
  it('blocks as unverified', () => {
    const state = loadingState('circuit_breaker');
    expect(isBlocking(state)).toBe(true);
    expect(describeBlock(state)).toBe('Unable to verify circuit breaker: Safety state loading');
  });
});
