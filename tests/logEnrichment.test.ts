import express from 'express';
import request from 'supertest';
import { logEnrichment } from '../src/lib/logEnrichment';
import type { Logger } from '../src/lib/logger';

type Entry = { level: string; message: string; fields: Record<string, unknown>; data?: Record<string, unknown> };

function recordingLogger(entries: Entry[], fields: Record<string, unknown> = {}): Logger {
  const write = (level: string) => (message: string, data?: Record<string, unknown>) => {
    entries.push({ level, message, fields, data });
  };
  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (extra) => recordingLogger(entries, { ...fields, ...extra }),
  };
}

describe('logEnrichment', () => {
  test('attaches a request-scoped logger and logs completion', async () => {
    const entries: Entry[] = [];
    let clock = 100;
    const app = express();
    app.use(
      logEnrichment({
        logger: recordingLogger(entries),
        includeUserAgent: false,
        customFields: () => ({ tenant: 'acme' }),
        now: () => (clock += 5),
      }),
    );
    app.get('/items', (req, res) => {
      req.log.debug('loading items');
      res.setHeader('X-Cache', 'MISS');
      res.json([]);
    });

    await request(app).get('/items?page=2');

    const requestFields = { method: 'GET', url: '/items?page=2', ip: expect.any(String), userAgent: undefined };
    expect(entries).toEqual([
      { level: 'debug', message: 'loading items', fields: { request: requestFields, tenant: 'acme' }, data: undefined },
      {
        level: 'info',
        message: 'Request completed',
        fields: { request: requestFields, tenant: 'acme' },
        data: { statusCode: 200, responseTime: 5, cacheStatus: 'MISS', rateLimitRemaining: undefined },
      },
    ]);
  });

  test('still attaches req.log when completion logging is disabled', async () => {
    const entries: Entry[] = [];
    const app = express();
    app.use(logEnrichment({ enabled: false, logger: recordingLogger(entries) }));
    app.get('/', (req, res) => {
      req.log.info('handled');
      res.send('ok');
    });

    await request(app).get('/');

    expect(entries.map((e) => e.message)).toEqual(['handled']);
  });
});
