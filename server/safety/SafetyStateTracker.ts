import { errorMessage } from '../errors/OrderEntryError';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import {
  SafetyKind,
  SafetyState,
  describeBlock,
  isBlocking,
  loadingState,
  parseSafetyState,
  unsafeState,
} from './SafetyState';

/** Source of truth for safety state, read on demand (session start, order confirmation). */
export interface SafetyStateSource {
  readSafetyState(kind: SafetyKind, signal: AbortSignal): Promise<unknown>;
}

export type SafetyFetchPurpose = 'session_init' | 'submission';

export const DEFAULT_SAFETY_FETCH_TIMEOUTS_MS: Record<SafetyFetchPurpose, number> = {
  session_init: 2_000,
  submission: 500,
};

export type SafetyVerdict = { allowed: true } | { allowed: false; blockedBy: SafetyState; reason: string };

type SafetyListener = (state: SafetyState) => void;

const KINDS: SafetyKind[] = ['kill_switch', 'circuit_breaker'];

export class SafetyStateTracker {
  private readonly states = new Map<SafetyKind, SafetyState>();
  private readonly revisions = new Map<SafetyKind, number>();
  private readonly listeners = new Set<SafetyListener>();
  private readonly timeouts: Record<SafetyFetchPurpose, number>;
  private readonly log: Logger;
  private readonly lifetime = new AbortController();
  private initialized = false;

  constructor(
    private readonly source: SafetyStateSource,
    options: { timeoutsMs?: Partial<Record<SafetyFetchPurpose, number>>; log?: Logger } = {}
  ) {
    this.timeouts = { ...DEFAULT_SAFETY_FETCH_TIMEOUTS_MS, ...options.timeoutsMs };
    this.log = options.log ?? defaultLogger;
    for (const kind of KINDS) {
      this.states.set(kind, loadingState(kind));
      this.revisions.set(kind, 0);
    }
  }

  onChange(listener: SafetyListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  current(kind: SafetyKind): SafetyState {
    return this.states.get(kind) ?? loadingState(kind);
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /** Parses a bus push. A defective payload yields UNSAFE with the defect as reason. */
  applyPush(kind: SafetyKind, raw: unknown): SafetyState {
    const parsed = parseSafetyState(kind, raw, 'push');
    let next: SafetyState;
    if (parsed.ok) {
      next = parsed.state;
    } else {
      this.log.warn('SAFETY_PUSH_INVALID', { kind, error: parsed.error });
      next = unsafeState(kind, `invalid ${kind} payload: ${parsed.error}`, 'unverified', 'push');
    }
    this.store(next);
    return next;
  }

  /**
   * Bounded read from the source of truth. Never rejects: timeout, transport
   * error, missing value and malformed payload all come back as UNSAFE.
   */
  async fetchAuthoritative(kind: SafetyKind, purpose: SafetyFetchPurpose): Promise<SafetyState> {
    const revisionAtStart = this.revisions.get(kind) ?? 0;
    const timeoutMs = this.timeouts[purpose];
    let fetched: SafetyState;

    try {
      const raw = await withTimeout(
        `${kind}_fetch`,
        timeoutMs,
        (signal) => this.source.readSafetyState(kind, signal),
        this.lifetime.signal
      );
      if (raw === null || raw === undefined || raw === '') {
        fetched = unsafeState(kind, 'state missing at source', 'unverified', 'fetch');
      } else {
        const parsed = parseSafetyState(kind, raw, 'fetch');
        if (parsed.ok) {
          fetched = parsed.state;
        } else {
          this.log.warn('SAFETY_FETCH_INVALID', { kind, purpose, error: parsed.error });
          fetched = unsafeState(kind, `invalid state at source: ${parsed.error}`, 'unverified', 'fetch');
        }
      }
    } catch (error) {
      this.log.warn('SAFETY_FETCH_FAILED', { kind, purpose, timeoutMs, error: errorMessage(error) });
      fetched = unsafeState(kind, `fetch failed (${errorMessage(error)})`, 'unverified', 'fetch');
    }

    if (this.lifetime.signal.aborted) {
      return fetched;
    }

    // A push that landed while the fetch was in flight is not overruled by a more permissive answer.
    const pushedMeanwhile = (this.revisions.get(kind) ?? 0) !== revisionAtStart;
    if (pushedMeanwhile && !isBlocking(fetched) && isBlocking(this.current(kind))) {
      this.log.info('SAFETY_FETCH_SUPERSEDED', { kind, purpose });
      return fetched;
    }
    this.store(fetched);
    return fetched;
  }

  /** Authoritative fetch of both kinds; consumers stay blocked until this resolves. */
  async initialize(): Promise<void> {
    await Promise.all(KINDS.map((kind) => this.fetchAuthoritative(kind, 'session_init')));
    this.initialized = true;
    this.log.info('SAFETY_STATE_INITIALIZED', {
      kill_switch: this.current('kill_switch').state,
      circuit_breaker: this.current('circuit_breaker').state,
    });
  }

  async refreshAll(purpose: SafetyFetchPurpose): Promise<SafetyState[]> {
    return Promise.all(KINDS.map((kind) => this.fetchAuthoritative(kind, purpose)));
  }

  /** Forces both kinds to UNSAFE/unverified, e.g. after a failed session start. */
  markUnverified(reason: string): void {
    for (const kind of KINDS) {
      this.store(unsafeState(kind, reason, 'unverified', 'initial'));
    }
  }

  evaluate(): SafetyVerdict {
    return evaluateSafety(KINDS.map((kind) => this.current(kind)));
  }

  isTradingAllowed(): boolean {
    return this.evaluate().allowed;
  }

  blockReason(): string | null {
    const verdict = this.evaluate();
    return verdict.allowed ? null : verdict.reason;
  }

  dispose(): void {
    this.lifetime.abort();
    this.listeners.clear();
  }

  private store(state: SafetyState): void {
    if (this.lifetime.signal.aborted) {
      return;
    }
    this.states.set(state.kind, state);
    this.revisions.set(state.kind, (this.revisions.get(state.kind) ?? 0) + 1);
    for (const listener of this.listeners) {
      try {
        listener(state);
      } catch (error) {
        this.log.error('SAFETY_LISTENER_FAILED', { kind: state.kind, error: errorMessage(error) });
      }
    }
  }
}

export function evaluateSafety(states: SafetyState[]): SafetyVerdict {
  for (const state of states) {
    if (isBlocking(state)) {
      return { allowed: false, blockedBy: state, reason: describeBlock(state) };
    }
  }
  return { allowed: true };
}
