import Decimal from 'decimal.js';

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;
const SYMBOL_PATTERN = /^[A-Z0-9]{1,5}$/;

/**
 * Parses an ISO-8601 timestamp carrying an explicit zone designator.
 * Anything else, including epoch numbers and zone-less strings, is rejected.
 */
export function parseIsoTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (!ISO_TIMESTAMP.test(trimmed)) {
    return null;
  }
  const ms = Date.parse(trimmed);
  if (!Number.isFinite(ms)) {
    return null;
  }
  return new Date(ms);
}

/** Finite decimal from a JSON number or numeric string; null otherwise. */
export function parseFiniteDecimal(value: unknown): Decimal | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    return new Decimal(value);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  let parsed: Decimal;
  try {
    parsed = new Decimal(value.trim());
  } catch {
    return null;
  }
  return parsed.isFinite() ? parsed : null;
}

export function parsePositiveDecimal(value: unknown): Decimal | null {
  const parsed = parseFiniteDecimal(value);
  return parsed && parsed.gt(0) ? parsed : null;
}

export function normalizeSymbol(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const symbol = value.trim().toUpperCase();
  return SYMBOL_PATTERN.test(symbol) ? symbol : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepts an already-decoded object or a JSON string holding one. */
export function decodeJsonRecord(raw: unknown): { ok: true; value: Record<string, unknown> } | { ok: false; error: string } {
  let decoded: unknown = raw;
  if (typeof raw === 'string') {
    try {
      decoded = JSON.parse(raw);
    } catch {
      return { ok: false, error: 'invalid JSON' };
    }
  }
  if (!isRecord(decoded)) {
    const kind = decoded === null ? 'null' : Array.isArray(decoded) ? 'array' : typeof decoded;
    return { ok: false, error: `expected object, got ${kind}` };
  }
  return { ok: true, value: decoded };
}

/** First defined value among camelCase and snake_case spellings of a field. */
export function pickField(record: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined) {
      return record[key];
    }
  }
  return undefined;
}
