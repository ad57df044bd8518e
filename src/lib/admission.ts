import type { BucketState, BucketStore } from '../types';
import { MemoryStore } from '../stores/memoryStore';
import { ConfigError } from './errors';
import { silentLogger, type Logger } from './logger';
import type { MetricsCollector } from './metrics';

export type AdmissionOptions = {
  capacity: number; // max tokens
  refillRate: number; // tokens added per refillInterval
  refillInterval: number; // ms
  store?: BucketStore;
  now?: () => number;
  metrics?: MetricsCollector;
  logger?: Logger;
};

export interface BucketSnapshot {
  tokens: number;
  capacity: number;
  retryAfterMs: number; // 0 when a token is available
}

export interface AdmissionDecision extends BucketSnapshot {
  allowed: boolean;
}

/**
 * Token-bucket admission control. Buckets refill continuously at
 * `refillRate / refillInterval` tokens per ms, capped at `capacity`; a key
 * that has never been seen starts full.
 */
export class AdmissionController {
  readonly capacity: number;
  readonly refillRate: number;
  readonly refillInterval: number;
  private readonly store: BucketStore;
  private readonly now: () => number;
  private readonly metrics?: MetricsCollector;
  private readonly logger: Logger;

  constructor(options: AdmissionOptions) {
    const { capacity, refillRate, refillInterval, store = new MemoryStore(), now = Date.now, metrics, logger } = options;
    assertPositive('capacity', capacity);
    assertPositive('refillRate', refillRate);
    assertPositive('refillInterval', refillInterval);
    this.capacity = capacity;
    this.refillRate = refillRate;
    this.refillInterval = refillInterval;
    this.store = store;
    this.now = now;
    this.metrics = metrics;
    this.logger = logger ?? silentLogger;
  }

  /** Consumes one token for `key` if one is available. Never blocks. */
  allow(key: string): boolean {
    return this.admit(key).allowed;
  }

  /** Like allow, but also returns the bucket as it stands after the decision. */
  admit(key: string): AdmissionDecision {
    const state = this.refill(key);
    const allowed = state.tokens >= 1;
    if (allowed) state.tokens -= 1;
    this.persist(key, state);

    if (allowed) {
      this.metrics?.increment('admissionAllowed');
    } else {
      this.metrics?.increment('admissionBlocked');
      this.logger.debug('admission rejected', { key, tokens: state.tokens });
    }
    return {
      allowed,
      tokens: state.tokens,
      capacity: this.capacity,
      retryAfterMs: this.timeUntilToken(state.tokens),
    };
  }

  inspect(key: string): BucketSnapshot {
    const { tokens } = this.refill(key);
    return { tokens, capacity: this.capacity, retryAfterMs: this.timeUntilToken(tokens) };
  }

  reset(key: string): void {
    this.store.deleteTokens(key);
  }

  private refill(key: string): BucketState {
    const now = this.now();
    const existing = this.store.getTokens(key, now);
    if (!existing) return { tokens: this.capacity, lastRefill: now };

    // A clock that steps backwards adds nothing and never rewinds lastRefill
    const elapsed = Math.max(0, now - existing.lastRefill);
    const tokens = Math.min(this.capacity, existing.tokens + (elapsed * this.refillRate) / this.refillInterval);
    return { tokens, lastRefill: Math.max(existing.lastRefill, now) };
  }

  private persist(key: string, state: BucketState): void {
    const ttlMs = ((this.capacity - state.tokens) * this.refillInterval) / this.refillRate;
    this.store.setTokens(key, state, Math.ceil(ttlMs));
  }

  private timeUntilToken(tokens: number): number {
    if (tokens >= 1) return 0;
    return Math.ceil(((1 - tokens) * this.refillInterval) / this.refillRate);
  }
}

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got ${value}`);
  }
}
