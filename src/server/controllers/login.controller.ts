/**
 * Login Controller
 *
 * Triggers an automated login run and reports the harvested cookies.
 */

import { Request, Response, RequestHandler } from 'express';
import { LoginCoordinator } from '../../core/login-coordinator.js';
import { ErrorKind } from '../../types/index.js';
import { asyncHandler } from '../middleware/index.js';
import { loginRequestSchema, parseBody } from '../schemas.js';

export function loginStatusForKind(kind: ErrorKind): number {
  switch (kind) {
    case 'Busy':
      return 409;
    case 'ChallengeBlocked':
      return 423;
    default:
      return 502;
  }
}

/**
 * POST /login and POST /login-form
 * Both take `username` and `password`; only the body encoding differs.
 */
export function createLoginController(coordinator: LoginCoordinator): RequestHandler {
  return asyncHandler(async (req: Request, res: Response) => {
    const credentials = parseBody(loginRequestSchema, req.body);
    const outcome = await coordinator.login(credentials);

    if (!outcome.success) {
      res.status(loginStatusForKind(outcome.error.kind)).json({
        success: false,
        error: outcome.error,
        session: outcome.session,
      });
      return;
    }

    res.json({
      success: true,
      cookies: outcome.cookieSet,
      cookieHeader: coordinator.cookieHeader(outcome.cookieSet),
      persisted: outcome.persisted,
      ...(outcome.persistenceError ? { persistenceError: outcome.persistenceError } : {}),
      session: outcome.session,
    });
  });
}
