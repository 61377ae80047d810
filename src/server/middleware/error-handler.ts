/**
 * Error Handler Middleware
 *
 * Turns thrown errors into the `{ success: false, error: { kind, message } }` body.
 */

import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import type { Logger } from 'winston';
import { AutomationError, AutomationErrorKind } from '../../utils/errors.js';

/**
 * Request-level error with an HTTP status.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly kind: string;

  constructor(statusCode: number, kind: string, message: string) {
    super(message);
    this.statusCode = statusCode;
    this.kind = kind;
  }

  static badRequest(message: string): AppError {
    return new AppError(400, 'InvalidRequest', message);
  }

  static notFound(message: string): AppError {
    return new AppError(404, 'NotFound', message);
  }
}

const STATUS_BY_KIND: Record<AutomationErrorKind, number> = {
  Busy: 409,
  ChallengeBlocked: 423,
  FieldNotFound: 502,
  UnknownVariant: 502,
  IncompleteCookieSet: 400,
  Failed: 502,
  NavigationTimeout: 504,
  Persistence: 500,
  NotFound: 404,
};

export function statusForKind(kind: AutomationErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof AppError) {
      res.status(err.statusCode).json({ success: false, error: { kind: err.kind, message: err.message } });
      return;
    }

    if (err instanceof AutomationError) {
      logger.warn('Request failed', { method: req.method, path: req.path, kind: err.kind, error: err.message });
      res.status(statusForKind(err.kind)).json({ success: false, error: { kind: err.kind, message: err.message } });
      return;
    }

    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ success: false, error: { kind: 'InvalidRequest', message: 'Invalid JSON in request body' } });
      return;
    }

    logger.error('Unhandled request error', {
      method: req.method,
      path: req.path,
      error: err instanceof Error ? err.message : 'Unknown error',
      stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(500).json({ success: false, error: { kind: 'Internal', message: 'Internal server error' } });
  };
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(AppError.notFound(`Route not found: ${req.method} ${req.path}`));
}
