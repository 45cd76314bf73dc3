import type { Request } from 'express';

/** Express request carrying the correlation ID assigned by the HTTP logging middleware. */
export type TracedRequest = Request & { requestId?: string };

/** Path without the query string, so tokens passed as query params never reach the logs. */
export function safePath(req: Request): string {
  return req.originalUrl?.split('?')[0] ?? req.url ?? '';
}
