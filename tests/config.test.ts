import { loadConfig } from '../src/config';
import { ConfigError } from '../src/lib/errors';

describe('loadConfig', () => {
  test('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      rateLimit: { capacity: 20, refillRate: 10, refillInterval: 1000 },
      cache: { ttl: 30_000, sweepInterval: 60_000 },
      executor: { workerCount: 4, queueCapacity: 1000, retention: 300_000 },
      pool: { size: 10, acquireTimeout: 5000 },
      logLevel: 'info',
      redisUrl: undefined,
    });
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      SURGE_RATE_CAPACITY: '5',
      SURGE_RATE_REFILL: '0.5',
      SURGE_QUEUE_CAPACITY: '0',
      SURGE_TASK_RETENTION_MS: '60000',
      SURGE_POOL_TIMEOUT_MS: '250',
      SURGE_LOG_LEVEL: 'debug',
      REDIS_URL: 'redis://localhost:6379',
    });

    expect(config.rateLimit).toEqual({ capacity: 5, refillRate: 0.5, refillInterval: 1000 });
    expect(config.executor).toEqual({ workerCount: 4, queueCapacity: 0, retention: 60_000 });
    expect(config.pool.acquireTimeout).toBe(250);
    expect(config.logLevel).toBe('debug');
    expect(config.redisUrl).toBe('redis://localhost:6379');
  });

  test('ignores blank values', () => {
    expect(loadConfig({ SURGE_WORKERS: '  ', REDIS_URL: '' }).executor.workerCount).toBe(4);
  });

  test('rejects invalid values with ConfigError', () => {
    expect(() => loadConfig({ SURGE_WORKERS: '2.5' })).toThrow(
      new ConfigError('SURGE_WORKERS must be a positive integer, got "2.5"'),
    );
    expect(() => loadConfig({ SURGE_CACHE_TTL_MS: '0' })).toThrow('SURGE_CACHE_TTL_MS must be a positive number, got "0"');
    expect(() => loadConfig({ SURGE_QUEUE_CAPACITY: '-1' })).toThrow(
      'SURGE_QUEUE_CAPACITY must be a non-negative integer, got "-1"',
    );
    expect(() => loadConfig({ SURGE_LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });
});
