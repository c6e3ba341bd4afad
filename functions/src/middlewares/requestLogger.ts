import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import * as functions from 'firebase-functions';

export interface TracedRequest extends Request {
  requestId?: string;
}

export function createRequestId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 8);
}

/**
 * Tags each request with a short id (echoed as X-Request-ID) and logs
 * method, path, status and duration once the response is finished.
 */
export function requestLogger(req: TracedRequest, res: Response, next: NextFunction): void {
  const requestId = createRequestId();
  const startedAt = Date.now();
  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  res.on('finish', () => {
    const durationMs = Date.now() - startedAt;
    const message = `[http] ${requestId} ${req.method} ${req.originalUrl ?? req.url} ${res.statusCode} ${durationMs}ms`;

    if (res.statusCode >= 500) {
      functions.logger.error(message);
    } else if (res.statusCode >= 400) {
      functions.logger.warn(message);
    } else {
      functions.logger.info(message);
    }
  });

  next();
}
