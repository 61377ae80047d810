import http from 'http';
import express, { Application } from 'express';
import type { Logger } from 'winston';
import { createErrorHandler, notFoundHandler } from './middleware/index.js';
import { RouteDependencies, createRouter } from './routes/index.js';

export function createApp(deps: RouteDependencies, logger: Logger): Application {
  const app = express();
  app.disable('x-powered-by');

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      logger.debug('Request handled', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  });

  app.use(createRouter(deps));
  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}

export function startServer(app: Application, port: number, host: string, logger: Logger): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app);
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      logger.info('HTTP server listening', { host, port });
      resolve(server);
    });
  });
}
