import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import type { TailEngine } from '../engine/engine.js';
import type { Subscriber } from '../engine/subscriber.js';
import { errMessage, sendEngineError, sendRequestValidationError } from '../http/errors.js';
import { getRequestId } from '../http/requestLogging.js';
import { pumpEvents, startHeartbeat, writeSseHeaders } from '../http/sse.js';
import { log } from '../log.js';

const StreamQuerySchema = z.object({
  file: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)])
});

export type StreamRouteOptions = {
  heartbeatMs: number;
};

export function registerStreamRoutes(app: Express, engine: TailEngine, options: StreamRouteOptions): void {
  app.get('/api/logs/stream', async (req: Request, res: Response) => {
    const requestId = getRequestId(res);
    const query = StreamQuerySchema.safeParse(req.query);
    if (!query.success) {
      sendRequestValidationError(res, query.error.issues);
      return;
    }
    const sourceIds = Array.from(new Set(typeof query.data.file === 'string' ? [query.data.file] : query.data.file));

    let subscriber: Subscriber;
    try {
      subscriber = await engine.subscribe(sourceIds);
    } catch (error) {
      log.warn('stream_rejected', { request_id: requestId, sources: sourceIds, error: errMessage(error) });
      sendEngineError(res, error);
      return;
    }

    const controller = new AbortController();
    const activeSubscriber = subscriber;
    res.on('close', () => {
      controller.abort();
      activeSubscriber.close();
    });

    writeSseHeaders(res);
    const stopHeartbeat = startHeartbeat(res, options.heartbeatMs);
    const started = Date.now();
    let delivered = 0;

    try {
      delivered = await pumpEvents(subscriber.events(), res, controller.signal);
    } catch (error) {
      log.warn('stream_write_failed', { request_id: requestId, error: errMessage(error) });
    } finally {
      stopHeartbeat();
      try {
        await engine.unsubscribe(subscriber.id);
      } catch (error) {
        log.error('stream_unsubscribe_failed', { request_id: requestId, error: errMessage(error) });
      }
      log.info('stream_closed', {
        request_id: requestId,
        sources: sourceIds,
        delivered,
        dropped: subscriber.droppedCount,
        duration_ms: Date.now() - started
      });
      res.end();
    }
  });
}
