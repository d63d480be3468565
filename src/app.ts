import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { TailEngine } from './engine/engine.js';
import { errMessage, sendSimpleError } from './http/errors.js';
import { getRequestId, requestLoggingMiddleware } from './http/requestLogging.js';
import { log } from './log.js';
import { registerOpsRoutes } from './routes/ops.js';
import { registerSourceRoutes } from './routes/sources.js';
import { registerStreamRoutes } from './routes/stream.js';
import { getVersionInfo } from './version.js';

export type AppOptions = {
  heartbeatMs: number;
};

export function createApp(engine: TailEngine, options: AppOptions): Express {
  const app = express();

  app.use(requestLoggingMiddleware);
  app.use(express.json({ limit: '1mb' }));

  registerOpsRoutes(app, engine, getVersionInfo());
  registerSourceRoutes(app, engine);
  registerStreamRoutes(app, engine, { heartbeatMs: options.heartbeatMs });

  app.use((_req: Request, res: Response) => {
    sendSimpleError(res, 404, 'Not found');
  });

  // Malformed JSON bodies and anything a handler let through.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = error instanceof SyntaxError ? 400 : 500;
    log.error('http_unhandled_error', { request_id: getRequestId(res), status, error: errMessage(error) });
    if (res.headersSent) {
      res.end();
      return;
    }
    sendSimpleError(res, status, status === 400 ? 'Invalid JSON body' : 'Internal server error');
  });

  return app;
}
