export * from './lib/admission';
export * from './lib/resultCache';
export * from './lib/taskExecutor';
export * from './lib/resourcePool';
export * from './lib/rateLimit';
export * from './lib/cache';
export * from './lib/invalidate';
export * from './lib/deferred';
export * from './lib/pooled';
export * from './lib/keys';
export * from './lib/errors';
export * from './lib/logger';
export * from './lib/logEnrichment';
export * from './lib/metrics';
export * from './lib/prometheus';
export * from './stores/memoryStore';
export * from './stores/redisStore';
export * from './config';
export type { BucketState, BucketStore, CacheEntry, CacheStore, Lease, TaskHandle, TaskState, TaskStatus } from './types';
