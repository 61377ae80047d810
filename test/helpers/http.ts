import type { Request, RequestHandler, Response } from 'express';
import type { Logger } from 'winston';
import { createErrorHandler } from '../../src/server/middleware';

export interface CapturedResponse {
  status: number;
  body: unknown;
  contentType?: string;
  location?: string;
}

/**
 * Runs one handler with a minimal request/response pair. Errors passed to
 * `next` go through the service's error handler.
 */
export function invoke(
  handler: RequestHandler,
  logger: Logger,
  request: { body?: unknown; method?: string; path?: string } = {}
): Promise<CapturedResponse> {
  return new Promise((resolve, reject) => {
    const req = {
      body: request.body,
      method: request.method ?? 'POST',
      path: request.path ?? '/',
    } as unknown as Request;

    let statusCode = 200;
    let contentType: string | undefined;
    const res = {
      status(code: number) {
        statusCode = code;
        return this;
      },
      type(value: string) {
        contentType = value;
        return this;
      },
      json(payload: unknown) {
        resolve({ status: statusCode, body: payload });
        return this;
      },
      send(payload: unknown) {
        resolve(contentType ? { status: statusCode, body: payload, contentType } : { status: statusCode, body: payload });
        return this;
      },
      redirect(code: number, url: string) {
        resolve({ status: code, body: undefined, location: url });
      },
    } as unknown as Response;

    const errorHandler = createErrorHandler(logger);
    handler(req, res, (err?: unknown) => {
      if (err === undefined) {
        reject(new Error('Handler called next() without a response'));
        return;
      }
      errorHandler(err, req, res, () => reject(new Error('Error handler passed the error on')));
    });
  });
}
