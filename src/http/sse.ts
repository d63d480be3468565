import type { Response } from 'express';
import type { HubEvent } from '../engine/types.js';

/** The part of a writable response the event pump needs. */
export interface SseTarget {
  write(chunk: string): boolean;
  once(event: 'drain', listener: () => void): unknown;
  removeListener(event: 'drain', listener: () => void): unknown;
}

export function writeSseHeaders(res: Response): void {
  res.status(200);
  res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
  res.setHeader('Cache-Control', 'no-cache, no-transform');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders();
}

function sseChunk(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function formatHubEvent(event: HubEvent): string {
  switch (event.type) {
    case 'line':
      return sseChunk('line', {
        sourceId: event.sourceId,
        seq: event.seq,
        timestamp: event.timestamp,
        content: event.content,
        ...(event.truncated ? { truncated: true } : {})
      });
    case 'gap':
      return sseChunk('gap', {
        sourceId: event.sourceId,
        gap: true,
        dropped: event.dropped,
        droppedCount: event.droppedCount
      });
    case 'rotated':
      return sseChunk('rotated', {
        sourceId: event.sourceId,
        rotated: true,
        timestamp: event.timestamp,
        reason: event.reason
      });
    case 'error':
      return sseChunk('error', {
        sourceId: event.sourceId,
        errorKind: event.errorKind,
        message: event.message
      });
  }
}

function waitForDrain(target: SseTarget, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    const done = (): void => {
      target.removeListener('drain', done);
      signal.removeEventListener('abort', done);
      resolve();
    };
    target.once('drain', done);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Writes events until the iterator ends or `signal` aborts, waiting for
 * `drain` whenever the socket buffer is full.
 */
export async function pumpEvents(
  events: AsyncIterable<HubEvent>,
  target: SseTarget,
  signal: AbortSignal
): Promise<number> {
  let written = 0;
  for await (const event of events) {
    if (signal.aborted) {
      break;
    }
    written += 1;
    if (!target.write(formatHubEvent(event))) {
      await waitForDrain(target, signal);
    }
  }
  return written;
}

/** Comment lines keep idle connections open through proxies. Returns a stop function. */
export function startHeartbeat(target: Pick<SseTarget, 'write'>, intervalMs: number): () => void {
  const timer = setInterval(() => {
    target.write(': ping\n\n');
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}
