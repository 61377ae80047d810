/**
 * Health Controller
 *
 * Liveness and service info; neither touches the cookie store or the browser.
 */

import { Request, Response, RequestHandler } from 'express';

export interface ServiceInfo {
  service: string;
  version: string;
}

export function createHealthController(info: ServiceInfo): RequestHandler {
  return (_req: Request, res: Response): void => {
    res.json({ status: 'healthy', service: info.service, version: info.version });
  };
}

/**
 * GET /
 */
export function createInfoController(info: ServiceInfo, endpoints: string[]): RequestHandler {
  return (_req: Request, res: Response): void => {
    res.json({ service: info.service, version: info.version, endpoints });
  };
}
