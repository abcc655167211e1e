import type { Request } from 'express';

/**
 * Read-only view of the inbound request that theme objects depend on.
 */
export interface RequestContext {
  /** Raw request URI: path plus optional query string. */
  readonly uri: string;
  readonly query: Readonly<Record<string, unknown>>;
}

/**
 * Non-empty path segments of `uri`, ignoring the query string.
 * `/a/b/c?x=1` -> `['a', 'b', 'c']`.
 */
export function pathSegments(uri: string): string[] {
  const q = uri.indexOf('?');
  const path = q === -1 ? uri : uri.slice(0, q);
  return path.split('/').filter((segment) => segment.length > 0);
}

export function fromExpressRequest(req: Request): RequestContext {
  return {
    uri: req.originalUrl,
    query: req.query,
  };
}
