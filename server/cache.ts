/**
 * TTL cache for lookup results.
 *
 * Each instance carries its own TTL and size limit. Concurrent loads of the
 * same key share a single in-flight promise; failed loads are not cached.
 */

interface CachedEntry<V> {
  value: V;
  storedAt: number;
  hitCount: number;
}

export interface TtlCacheOptions {
  ttlMs: number;
  maxEntries?: number;
  /** Number of oldest entries dropped once `maxEntries` is exceeded. */
  evictBatch?: number;
  now?: () => number;
  name?: string;
}

export interface CacheStats {
  size: number;
  pending: number;
  keys: string[];
  topKeys: string[];
}

export class TtlCache<V> {
  private readonly entries = new Map<string, CachedEntry<V>>();
  private readonly inFlight = new Map<string, Promise<V>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly evictBatch: number;
  private readonly now: () => number;
  private readonly name: string;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries ?? 2000;
    this.evictBatch = options.evictBatch ?? 200;
    this.now = options.now ?? Date.now;
    this.name = options.name ?? 'Cache';
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }

    entry.hitCount++;
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { value, storedAt: this.now(), hitCount: 0 });

    if (this.entries.size > this.maxEntries) {
      // Map keeps insertion order and set() re-inserts, so the front is oldest.
      const stale = Array.from(this.entries.keys()).slice(0, this.evictBatch);
      stale.forEach((k) => this.entries.delete(k));
      console.log(`[${this.name}] Evicted ${stale.length} entries`);
    }
  }

  async getOrLoad(key: string, load: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const loading = load()
      .then((value) => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, loading);
    return loading;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): number {
    const size = this.entries.size;
    this.entries.clear();
    console.log(`[${this.name}] Cleared ${size} entries`);
    return size;
  }

  stats(): CacheStats {
    const live = Array.from(this.entries.entries()).filter(([, entry]) => this.now() - entry.storedAt < this.ttlMs);
    const byHits = [...live].sort((a, b) => b[1].hitCount - a[1].hitCount);
    return {
      size: live.length,
      pending: this.inFlight.size,
      keys: live.map(([key]) => key),
      topKeys: byHits.slice(0, 10).map(([key, entry]) => `${key} (${entry.hitCount} hits)`),
    };
  }
}
