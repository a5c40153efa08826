import { promises as fs } from 'fs';
import * as path from 'path';

/** Serialised intent plus the form it was minted for; prices and qty kept as strings. */
export interface PersistedIntent {
  intentId: string;
  createdAt: string;
  form: {
    symbol: string;
    side: string;
    qty: string;
    orderType: string;
    limitPrice: string | null;
    stopPrice: string | null;
    timeInForce: string;
  };
}

/**
 * Where a session's pending intent survives a restart. `load` returns the raw
 * stored value; the caller validates it.
 */
export interface PendingIntentStore {
  load(sessionId: string): Promise<unknown>;
  save(sessionId: string, record: PersistedIntent): Promise<void>;
  clear(sessionId: string): Promise<void>;
}

export function intentKey(sessionId: string): string {
  return `order_entry:${sessionId}`;
}

export class InMemoryIntentStore implements PendingIntentStore {
  private readonly records = new Map<string, unknown>();

  async load(sessionId: string): Promise<unknown> {
    return this.records.get(intentKey(sessionId)) ?? null;
  }

  async save(sessionId: string, record: PersistedIntent): Promise<void> {
    this.records.set(intentKey(sessionId), JSON.parse(JSON.stringify(record)));
  }

  async clear(sessionId: string): Promise<void> {
    this.records.delete(intentKey(sessionId));
  }

  /** Stores an arbitrary value, e.g. a corrupt record. */
  put(sessionId: string, raw: unknown): void {
    this.records.set(intentKey(sessionId), raw);
  }

  size(): number {
    return this.records.size;
  }
}

/** One JSON file per session under `dir`. */
export class JsonFileIntentStore implements PendingIntentStore {
  constructor(private readonly dir: string) {}

  async load(sessionId: string): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath(sessionId), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
    try {
      return JSON.parse(text);
    } catch {
      // Handed back as-is; the caller treats it as corrupt.
      return text;
    }
  }

  async save(sessionId: string, record: PersistedIntent): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const target = this.filePath(sessionId);
    const temp = `${target}.tmp`;
    await fs.writeFile(temp, JSON.stringify({ key: intentKey(sessionId), ...record }), 'utf8');
    await fs.rename(temp, target);
  }

  async clear(sessionId: string): Promise<void> {
    try {
      await fs.unlink(this.filePath(sessionId));
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }

  private filePath(sessionId: string): string {
    const safe = sessionId.replace(/[^A-Za-z0-9_-]/g, '_');
    return path.join(this.dir, `order_entry_${safe}.json`);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
