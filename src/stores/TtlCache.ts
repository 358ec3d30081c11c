/**
 * Bounded in-memory cache with a fixed time-to-live.
 * When full, the entry stored longest ago is evicted first. Re-storing a key
 * counts as a fresh insertion.
 */

interface CacheEntry<V> {
  value: V;
  storedAt: number;
}

export interface TtlCacheOptions {
  ttlMs: number;
  capacity: number;
  /** Clock override for tests. */
  now?: () => number;
}

export class TtlCache<V> {
  // Map iteration order is insertion order; set() re-inserts so the first key is always the oldest.
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly capacity: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    if (options.capacity < 1) {
      throw new RangeError(`Cache capacity must be positive, got ${options.capacity}`);
    }
    this.ttlMs = options.ttlMs;
    this.capacity = options.capacity;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.delete(key);
    this.purgeExpired();

    while (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, { value, storedAt: this.now() });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  // ── Private ──

  private purgeExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (now - entry.storedAt < this.ttlMs) break;
      this.entries.delete(key);
    }
  }
}
