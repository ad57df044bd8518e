import type { Request, Response, NextFunction } from 'express';
import { createLogger, type Logger } from './logger';

export interface LogEnrichmentOptions {
  enabled?: boolean;
  logger?: Logger;
  includeUserAgent?: boolean;
  customFields?: (req: Request) => Record<string, unknown>;
  now?: () => number;
}

/**
 * Attaches `req.log`, a logger carrying the request's method, url and ip, and
 * logs one completion line per response with its cache and rate-limit headers.
 */
export function logEnrichment(options: LogEnrichmentOptions = {}) {
  const { enabled = true, logger = createLogger(), includeUserAgent = true, customFields, now = Date.now } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = now();
    req.log = logger.child({
      request: {
        method: req.method,
        url: req.originalUrl,
        ip: req.ip,
        userAgent: includeUserAgent ? req.get('User-Agent') : undefined,
      },
      ...customFields?.(req),
    });
    if (!enabled) return next();

    res.on('finish', () => {
      req.log.info('Request completed', {
        statusCode: res.statusCode,
        responseTime: now() - startTime,
        cacheStatus: res.getHeader('X-Cache'),
        rateLimitRemaining: res.getHeader('X-RateLimit-Remaining'),
      });
    });
    next();
  };
}

declare global {
  namespace Express {
    interface Request {
      log: Logger;
    }
  }
}
