import { Request, Response, NextFunction } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { BirthDataError } from '../utils/birthData';
import { InvalidCursorError } from '../services/repositories/common/pagination';
import { captureException } from '../utils/sentry';

type ErrorBody = {
  code: string;
  message: string;
  details?: unknown;
  stack?: string;
};

/**
 * Maps errors we know how to describe to a 4xx body; everything else is a 500.
 */
export function describeClientError(err: unknown): { status: number; body: ErrorBody } | null {
  if (err instanceof z.ZodError) {
    return {
      status: 400,
      body: { code: 'validation_failed', message: 'Invalid request body', details: err.errors },
    };
  }
  if (err instanceof BirthDataError) {
    return { status: 400, body: { code: err.code, message: err.message } };
  }
  if (err instanceof InvalidCursorError) {
    return { status: 400, body: { code: err.code, message: err.message } };
  }
  if (err instanceof SyntaxError && 'body' in err) {
    return { status: 400, body: { code: 'invalid_json', message: 'Request body is not valid JSON' } };
  }
  return null;
}

/**
 * Catch-block responder for route handlers: known client errors keep their
 * 4xx body, anything else is logged and answered with a 500.
 */
export function sendRouteError(
  res: Response,
  error: unknown,
  context: { tag: string; message: string },
): void {
  const clientError = describeClientError(error);
  if (clientError) {
    res.status(clientError.status).json(clientError.body);
    return;
  }

  functions.logger.error(`[${context.tag}] ${context.message}:`, error);
  captureException(error, { route: context.tag });
  res.status(500).json({
    code: 'server_error',
    message: context.message,
  });
}

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction) {
  // If headers have already been sent, delegate to the default Express error handler
  if (res.headersSent) {
    return next(err);
  }

  const clientError = describeClientError(err);
  if (clientError) {
    functions.logger.warn(`[error] ${req.method} ${req.path}: ${clientError.body.code}`);
    res.status(clientError.status).json(clientError.body);
    return;
  }

  functions.logger.error('Unhandled error:', err);

  if (process.env.NODE_ENV === 'production') {
    // In production, don't leak stack traces
    res.status(500).json({
      code: 'server_error',
      message: 'An unexpected error occurred',
    });
  } else {
    res.status(500).json({
      code: 'server_error',
      message: err.message,
      stack: err.stack,
    });
  }
}
