import 'dotenv/config';
import express from 'express';
import Redis from 'ioredis';
import {
  AdmissionController,
  MetricsCollector,
  MemoryStore,
  RedisStore,
  ResourcePool,
  ResultCache,
  TaskExecutor,
  cached,
  createLogger,
  createMetricsMiddleware,
  deferred,
  invalidateMatchingGet,
  keyByHeader,
  loadConfig,
  logEnrichment,
  prometheusMetrics,
  rateLimit,
  taskStatus,
  withResource,
  type CacheStore,
} from '../../src';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel, fields: { service: 'surgeguard-example' } });
const metrics = new MetricsCollector();

type Report = { id: string; total: number; generatedAt: string };

// Stand-in for a database driver connection
class Connection {
  constructor(readonly id: number) {}
  async query(sql: string): Promise<{ sql: string; connection: number }> {
    await new Promise((resolve) => setTimeout(resolve, 20));
    return { sql, connection: this.id };
  }
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

async function main() {
  const reportStore: CacheStore<Report> = config.redisUrl
    ? new RedisStore<Report>(new Redis(config.redisUrl), { prefix: 'surge:' })
    : new MemoryStore<Report>();

  const admission = new AdmissionController({ ...config.rateLimit, metrics, logger });
  const reports = new ResultCache<Report>({ ...config.cache, store: reportStore, metrics, logger });
  const executor = new TaskExecutor<{ rows: number }>({ ...config.executor, metrics, logger });
  const pool = await ResourcePool.create({
    size: config.pool.size,
    create: (i) => new Connection(i),
    metrics,
    logger,
  });

  const app = express();
  app.use(express.json());
  app.use(logEnrichment({ logger }));
  app.use(createMetricsMiddleware({ metrics }));
  app.use(prometheusMetrics({ metrics, path: '/metrics' }));

  app.use(
    rateLimit({
      controller: admission,
      keyGenerator: keyByHeader('x-api-key', { fallbackToIp: true }),
      hooks: {
        onBlocked: ({ key, retryAfterMs, req }) => req.log.warn('Rate limit exceeded', { key, retryAfterMs }),
      },
    }),
  );

  // Slow lookup; concurrent identical requests share one computation
  app.get(
    '/reports/:id',
    cached({ cache: reports, hooks: { onMiss: ({ key, req }) => req.log.info('Cache miss', { key }) } }, async (req) => {
      await sleep(500);
      return { id: req.params.id, total: Math.round(Math.random() * 1000), generatedAt: new Date().toISOString() };
    }),
  );
  app.post('/reports/:id', invalidateMatchingGet({ cache: reports }), (_req, res) => {
    res.json({ invalidated: true });
  });

  app.post(
    '/exports',
    deferred({
      executor,
      statusPath: '/tasks',
      work: () => async () => {
        await sleep(2000);
        return { rows: 42 };
      },
    }),
  );
  app.get('/tasks/:id', taskStatus({ executor }));

  app.get(
    '/db/ping',
    withResource({ pool, timeout: config.pool.acquireTimeout }, async (_req, res, connection) => {
      res.json(await connection.query('SELECT 1'));
    }),
  );

  const port = Number(process.env.PORT || 3000);
  const server = app.listen(port, () => {
    logger.info('Example app listening', { url: `http://localhost:${port}` });
  });

  process.on('SIGTERM', () => {
    server.close();
    reports.close();
    Promise.all([executor.shutdown(), pool.close()])
      .then(() => logger.info('Shut down cleanly'))
      .catch((error: unknown) => logger.error('Shutdown failed', { error: String(error) }));
  });
}

main().catch((error: unknown) => {
  logger.error('Failed to start', { error: String(error) });
  process.exitCode = 1;
});
