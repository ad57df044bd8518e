import type { CacheStore } from '../types';
import { MemoryStore } from '../stores/memoryStore';
import { ConfigError, toError } from './errors';
import { silentLogger, type Logger } from './logger';
import type { MetricsCollector } from './metrics';

export type CacheOutcome = 'hit' | 'miss' | 'coalesced';

export type ResultCacheOptions<T> = {
  ttl: number; // ms
  store?: CacheStore<T>;
  now?: () => number;
  sweepInterval?: number; // ms; background eviction of expired entries
  metrics?: MetricsCollector;
  logger?: Logger;
  hooks?: {
    onHit?: (info: { fingerprint: string }) => void;
    onMiss?: (info: { fingerprint: string }) => void;
    onCoalesced?: (info: { fingerprint: string }) => void;
    onError?: (info: { fingerprint?: string; error: Error; stage: 'read' | 'write' | 'compute' | 'sweep' }) => void;
  };
};

export interface Resolved<T> {
  value: T;
  outcome: CacheOutcome;
}

/**
 * Memoizes computations by fingerprint with single-flight semantics: while a
 * lookup or computation for a fingerprint is in flight, every other caller for
 * that fingerprint awaits the same promise and observes the same value or error.
 */
export class ResultCache<T> {
  readonly ttl: number;
  private readonly store: CacheStore<T>;
  private readonly now: () => number;
  private readonly metrics?: MetricsCollector;
  private readonly logger: Logger;
  private readonly hooks: NonNullable<ResultCacheOptions<T>['hooks']>;
  private readonly pending = new Map<string, Promise<T>>();
  // Flights invalidated while running; their results are returned but not stored
  private readonly staleFlights = new WeakSet<Promise<T>>();
  private sweepTimer?: NodeJS.Timeout;

  constructor(options: ResultCacheOptions<T>) {
    const { ttl, store = new MemoryStore<T>(), now = Date.now, sweepInterval, metrics, logger, hooks = {} } = options;
    if (!Number.isFinite(ttl) || ttl <= 0) {
      throw new ConfigError(`ttl must be a positive number of milliseconds, got ${ttl}`);
    }
    this.ttl = ttl;
    this.store = store;
    this.now = now;
    this.metrics = metrics;
    this.logger = logger ?? silentLogger;
    this.hooks = hooks;

    if (sweepInterval !== undefined) {
      if (!Number.isFinite(sweepInterval) || sweepInterval <= 0) {
        throw new ConfigError(`sweepInterval must be a positive number of milliseconds, got ${sweepInterval}`);
      }
      this.sweepTimer = setInterval(() => {
        this.sweep().catch((error: unknown) => this.report('sweep', toError(error)));
      }, sweepInterval);
      this.sweepTimer.unref();
    }
  }

  async getOrCompute(fingerprint: string, compute: () => T | Promise<T>): Promise<T> {
    const { value } = await this.resolve(fingerprint, compute);
    return value;
  }

  /** Like getOrCompute, but also reports how the value was obtained. */
  async resolve(fingerprint: string, compute: () => T | Promise<T>): Promise<Resolved<T>> {
    const inFlight = this.pending.get(fingerprint);
    if (inFlight) {
      this.metrics?.increment('cacheCoalesced');
      this.hooks.onCoalesced?.({ fingerprint });
      return { value: await inFlight, outcome: 'coalesced' };
    }

    let outcome: CacheOutcome = 'miss';
    // Registered before the first await so a concurrent caller can only join it
    const task: Promise<T> = this.lookupOrCompute(
      fingerprint,
      compute,
      () => this.staleFlights.has(task),
      (o) => (outcome = o),
    ).finally(() => {
      if (this.pending.get(fingerprint) === task) this.pending.delete(fingerprint);
    });
    this.pending.set(fingerprint, task);

    const value = await task;
    return { value, outcome };
  }

  async peek(fingerprint: string): Promise<T | undefined> {
    const entry = await this.store.get(fingerprint, this.now());
    return entry?.value;
  }

  /**
   * Deletes the stored entry. A computation already running for `fingerprint`
   * still answers its waiting callers but no longer writes its result, and the
   * next caller starts a fresh one.
   */
  async invalidate(fingerprint: string): Promise<void> {
    const inFlight = this.pending.get(fingerprint);
    if (inFlight) {
      this.staleFlights.add(inFlight);
      this.pending.delete(fingerprint);
    }
    await this.store.delete(fingerprint);
  }

  inFlight(fingerprint: string): boolean {
    return this.pending.has(fingerprint);
  }

  async sweep(): Promise<number> {
    if (!this.store.sweep) return 0;
    const evicted = await this.store.sweep(this.now());
    if (evicted > 0) this.logger.debug('cache sweep evicted entries', { evicted });
    return evicted;
  }

  close(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  private async lookupOrCompute(
    fingerprint: string,
    compute: () => T | Promise<T>,
    isStale: () => boolean,
    setOutcome: (outcome: CacheOutcome) => void,
  ): Promise<T> {
    try {
      const cached = await this.store.get(fingerprint, this.now());
      if (cached) {
        setOutcome('hit');
        this.metrics?.increment('cacheHits');
        this.hooks.onHit?.({ fingerprint });
        return cached.value;
      }
    } catch (error) {
      this.report('read', toError(error), fingerprint);
    }

    setOutcome('miss');
    this.metrics?.increment('cacheMisses');
    this.hooks.onMiss?.({ fingerprint });

    let value: T;
    try {
      value = await compute();
    } catch (error) {
      const err = toError(error);
      this.report('compute', err, fingerprint);
      throw err;
    }

    if (isStale()) {
      this.logger.debug('cache write skipped after invalidation', { fingerprint });
      return value;
    }
    try {
      await this.store.set(fingerprint, { value, expiresAt: this.now() + this.ttl, ttlMs: this.ttl });
    } catch (error) {
      this.report('write', toError(error), fingerprint);
    }
    return value;
  }

  private report(stage: 'read' | 'write' | 'compute' | 'sweep', error: Error, fingerprint?: string): void {
    this.metrics?.increment('cacheErrors');
    this.logger.warn(`cache ${stage} failed`, { fingerprint, error });
    this.hooks.onError?.({ fingerprint, error, stage });
  }
}
