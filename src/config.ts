import { ConfigError } from './lib/errors';
import { isLogLevel, type LogLevel } from './lib/logger';

export interface SurgeConfig {
  rateLimit: { capacity: number; refillRate: number; refillInterval: number };
  cache: { ttl: number; sweepInterval: number };
  executor: { workerCount: number; queueCapacity: number; retention: number };
  pool: { size: number; acquireTimeout: number };
  logLevel: LogLevel;
  redisUrl?: string;
}

type Env = Record<string, string | undefined>;

/** Reads SURGE_* settings from the environment, falling back to defaults. */
export function loadConfig(env: Env = process.env): SurgeConfig {
  const logLevel = env.SURGE_LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`SURGE_LOG_LEVEL must be one of debug, info, warn, error; got "${logLevel}"`);
  }

  return {
    rateLimit: {
      capacity: readNumber(env, 'SURGE_RATE_CAPACITY', 20),
      refillRate: readNumber(env, 'SURGE_RATE_REFILL', 10),
      refillInterval: readNumber(env, 'SURGE_RATE_INTERVAL_MS', 1000),
    },
    cache: {
      ttl: readNumber(env, 'SURGE_CACHE_TTL_MS', 30_000),
      sweepInterval: readNumber(env, 'SURGE_CACHE_SWEEP_MS', 60_000),
    },
    executor: {
      workerCount: readNumber(env, 'SURGE_WORKERS', 4, { integer: true }),
      queueCapacity: readNumber(env, 'SURGE_QUEUE_CAPACITY', 1000, { integer: true, allowZero: true }),
      retention: readNumber(env, 'SURGE_TASK_RETENTION_MS', 300_000, { allowZero: true }),
    },
    pool: {
      size: readNumber(env, 'SURGE_POOL_SIZE', 10, { integer: true }),
      acquireTimeout: readNumber(env, 'SURGE_POOL_TIMEOUT_MS', 5000, { allowZero: true }),
    },
    logLevel,
    redisUrl: env.REDIS_URL || undefined,
  };
}

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  rules: { integer?: boolean; allowZero?: boolean } = {},
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  const valid =
    Number.isFinite(value) && (rules.allowZero ? value >= 0 : value > 0) && (!rules.integer || Number.isInteger(value));
  if (!valid) {
    const kind = rules.integer ? 'integer' : 'number';
    throw new ConfigError(`${name} must be a ${rules.allowZero ? 'non-negative' : 'positive'} ${kind}, got "${raw}"`);
  }
  return value;
}
