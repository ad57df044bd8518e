import type { Request, Response, NextFunction } from 'express';
import { requestFingerprint } from './keys';
import type { CacheOutcome, ResultCache } from './resultCache';

export type CachedOptions<T> = {
  cache: ResultCache<T>;
  fingerprint?: (req: Request) => string;
  shouldBypass?: (req: Request) => boolean;
  hooks?: {
    onHit?: (info: { key: string; req: Request }) => void;
    onMiss?: (info: { key: string; req: Request }) => void;
    onCoalesced?: (info: { key: string; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

const CACHE_HEADER: Record<CacheOutcome, string> = { hit: 'HIT', miss: 'MISS', coalesced: 'COALESCED' };

/**
 * Serves `handler`'s JSON result through a ResultCache. Concurrent requests
 * with the same fingerprint share one handler invocation.
 */
export function cached<T>(options: CachedOptions<T>, handler: (req: Request) => T | Promise<T>) {
  const { cache, fingerprint = requestFingerprint, shouldBypass, hooks } = options;

  return async function cachedHandler(req: Request, res: Response, next: NextFunction) {
    try {
      if (shouldBypass?.(req)) {
        res.setHeader('X-Cache', 'BYPASS');
        res.json(await handler(req));
        return;
      }

      const key = fingerprint(req);
      const { value, outcome } = await cache.resolve(key, () => handler(req));
      if (outcome === 'hit') hooks?.onHit?.({ key, req });
      else if (outcome === 'miss') hooks?.onMiss?.({ key, req });
      else hooks?.onCoalesced?.({ key, req });

      res.setHeader('X-Cache', CACHE_HEADER[outcome]);
      res.json(value);
    } catch (error) {
      hooks?.onError?.({ error, req });
      next(error);
    }
  };
}
