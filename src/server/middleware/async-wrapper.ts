/**
 * Async Wrapper Middleware
 *
 * Wraps async route handlers so rejected promises reach the Express error handler.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction
) => Promise<void>;

/**
 * @example
 * router.get('/cookies', asyncHandler(async (req, res) => {
 *   res.json(await coordinator.current());
 * }));
 */
export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
