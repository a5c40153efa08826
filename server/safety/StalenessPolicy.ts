export interface FieldSnapshot<T> {
  value: T | null;
  observedAt: Date | null;
}

export type StalenessField = 'position' | 'price' | 'buyingPower' | 'riskLimits';

export type StalenessThresholds = Record<StalenessField, number>;

export const DEFAULT_STALENESS_THRESHOLDS_MS: StalenessThresholds = {
  position: 30_000,
  price: 30_000,
  buyingPower: 60_000,
  riskLimits: 300_000,
};

export function emptySnapshot<T>(): FieldSnapshot<T> {
  return { value: null, observedAt: null };
}

export function snapshotOf<T>(value: T | null, observedAt: Date | null): FieldSnapshot<T> {
  // A value without a server timestamp is not usable, and neither is a timestamp without a value.
  if (value === null || observedAt === null) {
    return { value: null, observedAt: null };
  }
  return { value, observedAt };
}

/** Age in ms, or null when the snapshot was never observed. */
export function ageMs<T>(snapshot: FieldSnapshot<T>, now: Date): number | null {
  if (!snapshot.observedAt) {
    return null;
  }
  return now.getTime() - snapshot.observedAt.getTime();
}

/** Fresh iff observed and `now - observedAt <= maxAgeMs`; age equal to the threshold is fresh. */
export function isFresh<T>(snapshot: FieldSnapshot<T>, maxAgeMs: number, now: Date): boolean {
  const age = ageMs(snapshot, now);
  if (age === null) {
    return false;
  }
  return age <= maxAgeMs;
}

export function usableValue<T>(snapshot: FieldSnapshot<T>, maxAgeMs: number, now: Date): T | null {
  if (snapshot.value === null || !isFresh(snapshot, maxAgeMs, now)) {
    return null;
  }
  return snapshot.value;
}

export class StalenessPolicy {
  private readonly thresholds: StalenessThresholds;

  constructor(overrides: Partial<StalenessThresholds> = {}) {
    this.thresholds = { ...DEFAULT_STALENESS_THRESHOLDS_MS, ...overrides };
  }

  maxAgeMs(field: StalenessField): number {
    return this.thresholds[field];
  }

  isFresh<T>(field: StalenessField, snapshot: FieldSnapshot<T>, now: Date): boolean {
    return isFresh(snapshot, this.thresholds[field], now);
  }

  usable<T>(field: StalenessField, snapshot: FieldSnapshot<T>, now: Date): T | null {
    return usableValue(snapshot, this.thresholds[field], now);
  }

  /** Human-readable staleness description for block reasons. */
  describe<T>(field: StalenessField, snapshot: FieldSnapshot<T>, now: Date): string {
    const age = ageMs(snapshot, now);
    if (age === null || snapshot.value === null) {
      return 'no data';
    }
    return `${Math.round(age / 1000)}s old (max ${Math.round(this.thresholds[field] / 1000)}s)`;
  }
}
