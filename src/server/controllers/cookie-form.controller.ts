/**
 * Cookie Form Controller
 *
 * HTML page where an operator pastes a cookie header copied from a browser.
 */

import fs from 'fs';
import path from 'path';
import { Request, Response, RequestHandler } from 'express';
import { LoginCoordinator } from '../../core/login-coordinator.js';
import { CookieRecord } from '../../types/index.js';
import { CookieRecordNotFoundError } from '../../utils/errors.js';
import { asyncHandler } from '../middleware/index.js';
import { manualCookiesSchema, parseBody, toCookieSet } from '../schemas.js';
import type { ServiceInfo } from './health.controller.js';

export const COOKIE_FORM_TEMPLATE = path.resolve(__dirname, '../../../templates/manual-cookies.html');

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * Fills `{{version}}` and `{{saved}}`. The saved block names the stored
 * cookies but never shows their values.
 */
export function renderCookieForm(template: string, version: string, record: CookieRecord | null): string {
  const saved = record
    ? `<div class="saved"><strong>Current saved cookies:</strong> ${escapeHtml(Object.keys(record.cookieSet).join(', '))}` +
      `<br><small>${escapeHtml(record.source)}, saved at ${escapeHtml(record.savedAt)}</small></div>`
    : '';

  return template.replace('{{version}}', () => escapeHtml(version)).replace('{{saved}}', () => saved);
}

async function currentOrNull(coordinator: LoginCoordinator): Promise<CookieRecord | null> {
  try {
    return await coordinator.current();
  } catch (error) {
    if (error instanceof CookieRecordNotFoundError) {
      return null;
    }
    throw error;
  }
}

export interface CookieFormController {
  page: RequestHandler;
  submit: RequestHandler;
}

export function createCookieFormController(
  coordinator: LoginCoordinator,
  manualCookieDomain: string,
  info: ServiceInfo,
  templatePath: string = COOKIE_FORM_TEMPLATE
): CookieFormController {
  /**
   * GET /cookies/form
   */
  const page = asyncHandler(async (_req: Request, res: Response) => {
    const template = await fs.promises.readFile(templatePath, 'utf-8');
    const record = await currentOrNull(coordinator);
    res.type('html').send(renderCookieForm(template, info.version, record));
  });

  /**
   * POST /cookies/form
   * Saves the pasted header and sends the browser back to the page.
   */
  const submit = asyncHandler(async (req: Request, res: Response) => {
    const input = parseBody(manualCookiesSchema, req.body);
    await coordinator.submitManual(toCookieSet(input, manualCookieDomain));
    res.redirect(303, '/cookies/form');
  });

  return { page, submit };
}
