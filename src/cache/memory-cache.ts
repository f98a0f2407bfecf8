// ---------------------------------------------------------------------------
// Generic in-memory LRU cache with per-entry TTL.
// ---------------------------------------------------------------------------

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/** Default time-to-live: 10 minutes. */
const DEFAULT_TTL_MS = 600_000;

/**
 * LRU cache over a `Map`, whose insertion order doubles as recency order.
 *
 * - `get` re-inserts a hit so it becomes the most recently used entry.
 * - `set` on a full cache evicts the oldest entry first.
 * - Expired entries are dropped lazily when read.
 */
export class MemoryCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly maxEntries: number;

  constructor(maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError("maxEntries must be a positive integer");
    }
    this.maxEntries = maxEntries;
  }

  get(key: string): T | null {
    const entry = this.store.get(key);
    if (!entry) {
      return null;
    }

    this.store.delete(key);
    if (Date.now() > entry.expiresAt) {
      return null;
    }
    this.store.set(key, entry);

    return entry.value;
  }

  set(key: string, value: T, ttlMs: number = DEFAULT_TTL_MS): void {
    this.store.delete(key);

    if (this.store.size >= this.maxEntries) {
      for (const oldest of this.store.keys()) {
        this.store.delete(oldest);
        break;
      }
    }

    this.store.set(key, { value, expiresAt: Date.now() + ttlMs });
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  /** Remove every entry whose key satisfies `predicate`; returns how many. */
  deleteWhere(predicate: (key: string) => boolean): number {
    let removed = 0;
    for (const key of [...this.store.keys()]) {
      if (predicate(key)) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
