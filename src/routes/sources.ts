import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import type { TailEngine } from '../engine/engine.js';
import { errMessage, sendEngineError, sendRequestValidationError } from '../http/errors.js';
import { getRequestId } from '../http/requestLogging.js';
import { log } from '../log.js';

const ClearRequestSchema = z
  .object({
    file: z.string().trim().min(1)
  })
  .strict();

export function registerSourceRoutes(app: Express, engine: TailEngine): void {
  app.get('/api/files', async (_req: Request, res: Response) => {
    try {
      res.status(200).json(await engine.listFiles());
    } catch (error) {
      log.error('file_tree_failed', { request_id: getRequestId(res), error: errMessage(error) });
      sendEngineError(res, error);
    }
  });

  app.get('/api/sources', (_req: Request, res: Response) => {
    const sources = engine.listSources();
    res.status(200).json({ ok: true, count: sources.length, sources });
  });

  app.post('/api/logs/clear', async (req: Request, res: Response) => {
    const parsed = ClearRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendRequestValidationError(res, parsed.error.issues);
      return;
    }
    const body = parsed.data;

    try {
      await engine.clear(body.file);
      res.status(200).json({ status: 'success', file: body.file });
    } catch (error) {
      log.warn('source_clear_failed', { request_id: getRequestId(res), source_id: body.file, error: errMessage(error) });
      sendEngineError(res, error);
    }
  });
}
