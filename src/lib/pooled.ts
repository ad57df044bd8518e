import type { Request, Response, NextFunction } from 'express';
import { PoolClosedError, TimeoutError } from './errors';
import type { ResourcePool } from './resourcePool';

export type WithResourceOptions<R> = {
  pool: ResourcePool<R>;
  timeout?: number; // ms
  hooks?: {
    onUnavailable?: (info: { error: TimeoutError | PoolClosedError; req: Request }) => void;
  };
};

/**
 * Runs `handler` with a resource leased from `pool`. The lease is released when
 * the handler settles, whether it answered, threw or rejected.
 */
export function withResource<R>(
  options: WithResourceOptions<R>,
  handler: (req: Request, res: Response, resource: R) => void | Promise<void>,
) {
  const { pool, timeout, hooks } = options;

  return async function pooledHandler(req: Request, res: Response, next: NextFunction) {
    try {
      await pool.use((resource) => handler(req, res, resource), timeout);
    } catch (error) {
      if (error instanceof TimeoutError || error instanceof PoolClosedError) {
        hooks?.onUnavailable?.({ error, req });
        if (!res.headersSent) {
          res.setHeader('Retry-After', '1');
          res.status(503).json({ error: 'Service Unavailable', reason: error.code });
          return;
        }
      }
      next(error);
    }
  };
}
