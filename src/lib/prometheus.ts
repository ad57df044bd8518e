import type { Request, Response, NextFunction } from 'express';
import type { MetricsCollector } from './metrics';

export interface PrometheusOptions {
  metrics: MetricsCollector;
  path?: string;
}

export function prometheusMetrics(options: PrometheusOptions) {
  const { metrics, path = '/metrics' } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    if (req.path !== path) return next();
    try {
      const body = metrics.getPrometheusMetrics();
      res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
      res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
      res.status(200).send(body);
    } catch (error) {
      next(error);
    }
  };
}

/** Records per-endpoint response times once the response has been written. */
export function createMetricsMiddleware(options: { metrics: MetricsCollector; now?: () => number }) {
  const { metrics, now = Date.now } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = now();
    res.on('finish', () => {
      const routePath: unknown = req.route?.path;
      const endpoint = `${req.method} ${typeof routePath === 'string' ? req.baseUrl + routePath : req.originalUrl.split('?')[0]}`;
      metrics.recordRequest(endpoint, now() - startTime);
    });
    next();
  };
}
