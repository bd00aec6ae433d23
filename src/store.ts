import { deepFreeze, structurallyEqual } from './canonical.js';
import type { StoredResult, StoreSnapshot } from './types.js';

export function resultKey(legHash: string, date: string): string {
  return `${legHash}:${date}`;
}

export function parseResultKey(key: string): { legHash: string; date: string } {
  const i = key.indexOf(':');
  return { legHash: key.slice(0, i), date: key.slice(i + 1) };
}

function normalize(value: StoredResult): StoredResult {
  if (value.kind === 'found' && value.occurrences.length === 0) return Object.freeze({ kind: 'none' });
  return deepFreeze(structuredClone(value));
}

/**
 * Checked results keyed by (leg hash, date).
 *
 * Every method is synchronous, so each call is atomic with respect to the async
 * workers sharing the store: they only interleave at `await` points.
 * Stored values are deep-frozen copies, so reads and snapshots can be handed out
 * as-is. Re-putting an equal value is a no-op, and a failure marker never overwrites a
 * settled result (a settled result does overwrite a failure marker).
 */
export class ResultStore {
  private readonly entries = new Map<string, StoredResult>();

  static fromSnapshot(snapshot: StoreSnapshot): ResultStore {
    const store = new ResultStore();
    for (const [key, value] of Object.entries(snapshot)) {
      const { legHash, date } = parseResultKey(key);
      store.put(legHash, date, value);
    }
    return store;
  }

  get(legHash: string, date: string): StoredResult | undefined {
    return this.entries.get(resultKey(legHash, date));
  }

  has(legHash: string, date: string): boolean {
    return this.entries.has(resultKey(legHash, date));
  }

  /** Present and not a failure marker. */
  isSettled(legHash: string, date: string): boolean {
    const entry = this.get(legHash, date);
    return entry !== undefined && entry.kind !== 'failed';
  }

  put(legHash: string, date: string, value: StoredResult): void {
    const key = resultKey(legHash, date);
    const next = normalize(value);
    const existing = this.entries.get(key);
    if (existing) {
      if (structurallyEqual(existing, next)) return;
      if (existing.kind !== 'failed' && next.kind === 'failed') return;
    }
    this.entries.set(key, next);
  }

  get size(): number {
    return this.entries.size;
  }

  values(): StoredResult[] {
    return [...this.entries.values()];
  }

  snapshot(): StoreSnapshot {
    return Object.freeze(Object.fromEntries(this.entries));
  }
}
