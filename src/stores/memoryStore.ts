import type { BucketState, BucketStore, CacheEntry, CacheStore } from '../types';

export class MemoryStore<T = unknown> implements BucketStore, CacheStore<T> {
  private readonly buckets = new Map<string, BucketState & { expiresAt: number }>();
  private readonly cache = new Map<string, CacheEntry<T>>();

  async get(key: string, now: number): Promise<CacheEntry<T> | undefined> {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= now) {
      this.cache.delete(key);
      return undefined;
    }
    return { value: entry.value, expiresAt: entry.expiresAt };
  }

  async set(key: string, value: CacheEntry<T> & { ttlMs: number }): Promise<void> {
    this.cache.set(key, { value: value.value, expiresAt: value.expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.cache.delete(key);
  }

  sweep(now: number): number {
    return evictExpired(this.cache, now) + evictExpired(this.buckets, now);
  }

  get size(): { entries: number; buckets: number } {
    return { entries: this.cache.size, buckets: this.buckets.size };
  }

  // Token bucket methods; synchronous so a refill-and-consume is never interleaved
  getTokens(key: string, now: number): BucketState | undefined {
    const bucket = this.buckets.get(key);
    if (!bucket) return undefined;
    if (bucket.expiresAt <= now) {
      // Refilled to capacity by now; an absent bucket reads as full
      this.buckets.delete(key);
      return undefined;
    }
    return { tokens: bucket.tokens, lastRefill: bucket.lastRefill };
  }

  setTokens(key: string, state: BucketState, ttlMs: number): void {
    this.buckets.set(key, { tokens: state.tokens, lastRefill: state.lastRefill, expiresAt: state.lastRefill + ttlMs });
  }

  deleteTokens(key: string): void {
    this.buckets.delete(key);
  }
}

function evictExpired<V extends { expiresAt: number }>(map: Map<string, V>, now: number): number {
  let evicted = 0;
  for (const [key, entry] of map) {
    if (entry.expiresAt <= now) {
      map.delete(key);
      evicted++;
    }
  }
  return evicted;
}
