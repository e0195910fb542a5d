import type { Request } from 'express';

/** Returns the namespace a request's quota is counted under. */
export type KeyGenerator = (req: Request) => string;

export type KeyOptions = {
  fallbackToIp?: boolean;
  prefix?: string;
};

function fallback(req: Request, prefix: string, options?: KeyOptions): string {
  if (options?.fallbackToIp) return `${prefix}-ip:${req.ip ?? 'unknown'}`;
  return `${prefix}:anonymous`;
}

export function keyByHeader(headerName: string = 'x-api-key', options?: KeyOptions): KeyGenerator {
  const normalized = headerName.toLowerCase();
  const prefix = options?.prefix ?? 'key';
  return (req) => {
    const value = req.header(normalized);
    if (typeof value === 'string' && value.length > 0) return `${prefix}:${value}`;
    return fallback(req, prefix, options);
  };
}

export function keyByBearerToken(options?: KeyOptions & { headerName?: string }): KeyGenerator {
  const headerName = (options?.headerName ?? 'authorization').toLowerCase();
  const prefix = options?.prefix ?? 'bearer';
  return (req) => {
    const match = /^Bearer\s+(.+)$/i.exec(req.header(headerName) ?? '');
    const token = match?.[1];
    if (token) return `${prefix}:${token}`;
    return fallback(req, prefix, options);
  };
}

export function keyByUser(
  extractor: (req: Request) => string | number | undefined,
  options?: KeyOptions,
): KeyGenerator {
  const prefix = options?.prefix ?? 'user';
  return (req) => {
    const id = extractor(req);
    if (id !== undefined && `${id}`.length > 0) return `${prefix}:${id}`;
    return fallback(req, prefix, options);
  };
}
