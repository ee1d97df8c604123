type CacheEntry<T> = {
  value: T;
  insertedAt: number;
};

export type ResultCacheOptions = {
  capacity?: number;
  ttlMs?: number;
  now?: () => number;
};

export const DEFAULT_CACHE_CAPACITY = 20;
export const DEFAULT_CACHE_TTL_MS = 300_000;

/**
 * Bounded LRU cache with lazy TTL expiry.
 *
 * Every method runs synchronously to completion, so concurrent callers on the
 * event loop never observe a half-applied update. Recency is kept in a plain
 * array (least recent first); promotion is a linear scan over at most
 * `capacity` keys.
 */
export class ResultCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private recency: string[] = [];
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ResultCacheOptions = {}) {
    this.capacity = Math.max(1, Math.floor(options.capacity ?? DEFAULT_CACHE_CAPACITY));
    this.ttlMs = Math.max(0, options.ttlMs ?? DEFAULT_CACHE_TTL_MS);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.recency];
  }

  get(key: string): T | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (this.now() - entry.insertedAt > this.ttlMs) {
      this.entries.delete(key);
      this.removeFromRecency(key);
      return null;
    }

    this.promote(key);
    return entry.value;
  }

  set(key: string, value: T): void {
    if (this.entries.has(key)) {
      this.entries.set(key, { value, insertedAt: this.now() });
      this.promote(key);
      return;
    }

    if (this.entries.size >= this.capacity) {
      const leastRecent = this.recency.shift();
      if (leastRecent !== undefined) {
        this.entries.delete(leastRecent);
      }
    }

    this.entries.set(key, { value, insertedAt: this.now() });
    this.recency.push(key);
  }

  invalidateAll(): void {
    this.entries.clear();
    this.recency = [];
  }

  invalidate(predicate: (key: string) => boolean): number {
    const doomed = this.recency.filter((key) => predicate(key));
    for (const key of doomed) {
      this.entries.delete(key);
    }
    if (doomed.length > 0) {
      this.recency = this.recency.filter((key) => this.entries.has(key));
    }
    return doomed.length;
  }

  invalidateByPrefix(prefix: string): number {
    return this.invalidate((key) => key.startsWith(prefix));
  }

  private promote(key: string): void {
    this.removeFromRecency(key);
    this.recency.push(key);
  }

  private removeFromRecency(key: string): void {
    const index = this.recency.indexOf(key);
    if (index >= 0) {
      this.recency.splice(index, 1);
    }
  }
}
