import type { Request, Response, NextFunction } from 'express';
import type { AdmissionController } from './admission';
import type { KeyGenerator } from './keys';

export type RateLimitOptions = {
  controller: AdmissionController;
  keyGenerator?: KeyGenerator;
  message?: unknown; // 429 body
  hooks?: {
    onAllowed?: (info: { key: string; remaining: number; req: Request }) => void;
    onBlocked?: (info: { key: string; retryAfterMs: number; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

export function rateLimit(options: RateLimitOptions) {
  const {
    controller,
    keyGenerator = (req) => req.ip ?? 'unknown',
    message = { error: 'Too Many Requests' },
    hooks,
  } = options;

  return function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
    let key: string;
    try {
      key = `rl:${keyGenerator(req)}`;
    } catch (error) {
      hooks?.onError?.({ error, req });
      next(error);
      return;
    }

    const { allowed, tokens, retryAfterMs } = controller.admit(key);
    const remaining = Math.floor(tokens);

    res.setHeader('X-RateLimit-Limit', String(controller.capacity));
    res.setHeader('X-RateLimit-Remaining', String(remaining));

    if (!allowed) {
      res.setHeader('Retry-After', String(Math.ceil(retryAfterMs / 1000)));
      hooks?.onBlocked?.({ key, retryAfterMs, req });
      res.status(429).json(message);
      return;
    }
    hooks?.onAllowed?.({ key, remaining, req });
    next();
  };
}
