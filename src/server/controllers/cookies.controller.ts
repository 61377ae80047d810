/**
 * Cookies Controller
 *
 * Manual cookie submission and retrieval of the current record.
 */

import { Request, Response, RequestHandler } from 'express';
import { LoginCoordinator } from '../../core/login-coordinator.js';
import { asyncHandler } from '../middleware/index.js';
import { manualCookiesSchema, parseBody, toCookieSet } from '../schemas.js';

export interface CookiesController {
  submit: RequestHandler;
  current: RequestHandler;
}

export function createCookiesController(
  coordinator: LoginCoordinator,
  manualCookieDomain: string
): CookiesController {
  /**
   * POST /cookies
   */
  const submit = asyncHandler(async (req: Request, res: Response) => {
    const input = parseBody(manualCookiesSchema, req.body);
    const record = await coordinator.submitManual(toCookieSet(input, manualCookieDomain));
    res.status(201).json({
      success: true,
      record,
      cookieHeader: coordinator.cookieHeader(record.cookieSet),
    });
  });

  /**
   * GET /cookies
   */
  const current = asyncHandler(async (_req: Request, res: Response) => {
    const record = await coordinator.current();
    res.json({
      success: true,
      record,
      cookieHeader: coordinator.cookieHeader(record.cookieSet),
    });
  });

  return { submit, current };
}
