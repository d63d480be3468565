import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { log } from '../log.js';

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

function incomingRequestId(req: Request): string | undefined {
  const value = req.header(REQUEST_ID_HEADER)?.trim();
  return value && REQUEST_ID_PATTERN.test(value) ? value : undefined;
}

function isEventStream(res: Response): boolean {
  const type = res.getHeader('content-type');
  return typeof type === 'string' && type.startsWith('text/event-stream');
}

function routeOf(req: Request): string {
  const routePath: unknown = req.route?.path;
  return typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : req.path;
}

export function getRequestId(res: Response): string {
  const value: unknown = res.locals.requestId;
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }

  const generated = randomUUID();
  res.locals.requestId = generated;
  res.setHeader(REQUEST_ID_HEADER, generated);
  return generated;
}

/**
 * Writes one entry per request. Event streams live until the viewer leaves
 * and may never emit `finish`, so the entry is also written on `close`,
 * flagged when the client went away before the response ended.
 */
export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();
  const requestId = incomingRequestId(req) ?? randomUUID();

  res.locals.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  let logged = false;
  const record = (): void => {
    if (logged) {
      return;
    }
    logged = true;

    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
    const streaming = isEventStream(res);
    const aborted = !res.writableFinished;
    const fields = {
      request_id: requestId,
      method: req.method,
      path: req.path,
      route: routeOf(req),
      status: res.statusCode,
      duration_ms: Number(durationMs.toFixed(3)),
      ...(aborted ? { client_aborted: true } : {})
    };

    if (streaming) {
      log.info('http_stream', fields);
    } else if (aborted) {
      log.warn('http_request_aborted', fields);
    } else {
      log.info('http_request', fields);
    }
  };

  res.on('finish', record);
  res.on('close', record);
  next();
}
