import { randomUUID } from 'node:crypto';
import type { NextFunction, Response } from 'express';
import { safePath, TracedRequest } from '../common/request/traced-request';
import { JsonLogger } from './json-logger.service';

export function createHttpLoggingMiddleware(logger: JsonLogger) {
  return function httpLoggingMiddleware(req: TracedRequest, res: Response, next: NextFunction) {
    const start = process.hrtime.bigint();

    // Reuse the caller's correlation ID so a host app can trace across services.
    const incomingId = req.header('x-request-id');
    const requestId = incomingId && incomingId.trim().length > 0 ? incomingId.trim() : randomUUID();
    req.requestId = requestId;
    res.setHeader('x-request-id', requestId);

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;

      const meta: Record<string, unknown> = {
        requestId,
        method: req.method,
        path: safePath(req),
        statusCode: res.statusCode,
        durationMs: Math.round(durationMs * 10) / 10
      };

      if (res.statusCode >= 500) {
        logger.error('HTTP request failed', meta);
      } else if (res.statusCode >= 400) {
        logger.warn('HTTP request client error', meta);
      } else {
        logger.log('HTTP request', meta);
      }
    });

    next();
  };
}
