export interface BucketState {
  tokens: number;
  lastRefill: number; // timestamp ms
}

export interface BucketStore {
  getTokens(key: string, now: number): BucketState | undefined;
  // ttlMs: how long after lastRefill the bucket would be full again; it may be dropped after that
  setTokens(key: string, state: BucketState, ttlMs: number): void;
  deleteTokens(key: string): void;
}

export interface CacheEntry<T> {
  value: T;
  expiresAt: number; // timestamp ms
}

export interface CacheStore<T> {
  // Implementations drop entries with expiresAt <= now and report them as absent
  get(key: string, now: number): Promise<CacheEntry<T> | undefined> | CacheEntry<T> | undefined;
  set(key: string, entry: CacheEntry<T> & { ttlMs: number }): Promise<void> | void;
  delete(key: string): Promise<void> | void;
  sweep?(now: number): Promise<number> | number; // evicted count
}

export type TaskState = 'pending' | 'running' | 'succeeded' | 'failed';

export interface TaskHandle {
  readonly id: string;
}

export interface TaskStatus<T = unknown> {
  id: string;
  state: TaskState;
  result?: T;
  error?: Error;
  submittedAt: number;
  startedAt?: number;
  finishedAt?: number;
}

export interface Lease<R> {
  readonly id: number;
  readonly resource: R;
}
