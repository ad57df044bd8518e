import type { Request, Response, NextFunction } from 'express';
import type { ResultCache } from './resultCache';

export type InvalidateOptions<T> = {
  cache: ResultCache<T>;
  fingerprints?: string[];
  resolveFingerprints?: (req: Request) => string[] | Promise<string[]>;
  hooks?: {
    onInvalidated?: (info: { fingerprints: string[]; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

/** Drops cached results before a write handler runs. Failures never block the request. */
export function invalidateCache<T>(options: InvalidateOptions<T>) {
  const { cache, fingerprints, resolveFingerprints, hooks } = options;

  return async function invalidateMiddleware(req: Request, _res: Response, next: NextFunction) {
    try {
      const resolved = [...(fingerprints ?? []), ...((await resolveFingerprints?.(req)) ?? [])].filter(Boolean);
      if (resolved.length > 0) {
        await Promise.all(resolved.map((fp) => cache.invalidate(fp)));
        hooks?.onInvalidated?.({ fingerprints: resolved, req });
      }
    } catch (error) {
      hooks?.onError?.({ error, req });
    }
    next();
  };
}

// Invalidates the GET result for the current path (no query string)
export function invalidateMatchingGet<T>(options: { cache: ResultCache<T> }) {
  return invalidateCache({
    cache: options.cache,
    resolveFingerprints: (req) => [`cache:GET:${req.baseUrl + req.path}`],
  });
}
