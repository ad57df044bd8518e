import type { Request } from 'express';

export type KeyGenerator = (req: Request) => string;

type KeyOptions = { fallbackToIp?: boolean; prefix?: string };

function keyFrom(
  defaultPrefix: string,
  extract: (req: Request) => string | number | undefined,
  options: KeyOptions = {},
): KeyGenerator {
  const prefix = options.prefix ?? defaultPrefix;
  return (req) => {
    const id = extract(req);
    if (id !== undefined && `${id}`.length > 0) return `${prefix}:${id}`;
    if (options.fallbackToIp) return `${prefix}-ip:${req.ip ?? 'unknown'}`;
    return `${prefix}:anonymous`;
  };
}

export function keyByIp(): KeyGenerator {
  return (req) => `ip:${req.ip ?? 'unknown'}`;
}

export function keyByHeader(headerName: string = 'x-api-key', options?: KeyOptions): KeyGenerator {
  const normalized = headerName.toLowerCase();
  return keyFrom('token', (req) => req.header(normalized), options);
}

export function keyByBearerToken(options?: KeyOptions & { headerName?: string }): KeyGenerator {
  const headerName = (options?.headerName ?? 'authorization').toLowerCase();
  return keyFrom(
    'bearer',
    (req) => /^Bearer\s+(.+)$/i.exec(req.header(headerName) ?? '')?.[1],
    options,
  );
}

export function keyByQuery(paramName: string = 'api_key', options?: KeyOptions): KeyGenerator {
  return keyFrom(
    'query',
    (req) => {
      const value = req.query[paramName];
      return typeof value === 'string' ? value : undefined;
    },
    options,
  );
}

export function keyByUser(extractor: (req: Request) => string | number | undefined, options?: KeyOptions): KeyGenerator {
  return keyFrom('user', extractor, options);
}

/**
 * Cache fingerprint for a request: method, path and query parameters sorted by
 * name, so `?b=2&a=1` and `?a=1&b=2` share an entry.
 */
export function requestFingerprint(req: Request): string {
  const path = req.baseUrl + req.path;
  const params = new URLSearchParams();
  const query = new URL(req.originalUrl, 'http://localhost').searchParams;
  for (const name of [...new Set(query.keys())].sort()) {
    for (const value of query.getAll(name)) params.append(name, value);
  }
  const search = params.toString();
  return `cache:${req.method}:${path}${search ? `?${search}` : ''}`;
}
