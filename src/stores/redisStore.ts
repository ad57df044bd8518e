import type { CacheEntry, CacheStore } from '../types';

// The subset of ioredis' client used here; `new Redis(url)` satisfies it
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', ttlMs: number): Promise<unknown>;
  del(key: string): Promise<number>;
}

type Stored<T> = { value: T; expiresAt: number };

/**
 * Cache store backed by Redis. Values are stored as JSON, so only
 * JSON-serializable results survive a round trip. Redis expires keys on its
 * own; `expiresAt` is kept alongside so reads agree with the caller's clock.
 */
export class RedisStore<T = unknown> implements CacheStore<T> {
  constructor(
    private readonly client: RedisCacheClient,
    private readonly options: { prefix?: string } = {},
  ) {}

  async get(key: string, now: number): Promise<CacheEntry<T> | undefined> {
    const raw = await this.client.get(this.redisKey(key));
    if (!raw) return undefined;
    let parsed: Stored<T>;
    try {
      parsed = JSON.parse(raw);
    } catch {
      // Not ours or truncated; behave as a miss and let the next set overwrite it
      return undefined;
    }
    if (typeof parsed?.expiresAt !== 'number' || parsed.expiresAt <= now) {
      await this.client.del(this.redisKey(key));
      return undefined;
    }
    return { value: parsed.value, expiresAt: parsed.expiresAt };
  }

  async set(key: string, entry: CacheEntry<T> & { ttlMs: number }): Promise<void> {
    const ttlMs = Math.max(1, Math.ceil(entry.ttlMs));
    const payload: Stored<T> = { value: entry.value, expiresAt: entry.expiresAt };
    await this.client.set(this.redisKey(key), JSON.stringify(payload), 'PX', ttlMs);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(this.redisKey(key));
  }

  private redisKey(key: string): string {
    return `${this.options.prefix ?? ''}${key}`;
  }
}
