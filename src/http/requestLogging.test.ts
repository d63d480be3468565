import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import express from 'express';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getRecentLogs } from '../log.js';
import { requestLoggingMiddleware } from './requestLogging.js';

function entriesFor(requestId: string): ReturnType<typeof getRecentLogs> {
  return getRecentLogs(1000).filter((entry) => entry.fields.request_id === requestId);
}

describe('requestLoggingMiddleware', () => {
  let server: Server;
  let baseUrl = '';

  beforeEach(async () => {
    const app = express();
    app.use(requestLoggingMiddleware);
    app.get('/ping', (_req, res) => {
      res.status(200).json({ ok: true });
    });
    app.get('/events', (_req, res) => {
      res.setHeader('content-type', 'text/event-stream; charset=utf-8');
      res.flushHeaders();
      res.write(': connected\n\n');
    });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('logs a finished request once under the caller id', async () => {
    const res = await fetch(`${baseUrl}/ping`, { headers: { 'x-request-id': 'req-ping-1' } });
    expect(res.headers.get('x-request-id')).toBe('req-ping-1');
    await res.json();

    await vi.waitFor(() => expect(entriesFor('req-ping-1')).toHaveLength(1));
    const [entry] = entriesFor('req-ping-1');
    expect(entry?.level).toBe('info');
    expect(entry?.msg).toBe('http_request');
    expect(entry?.fields).toMatchObject({ method: 'GET', path: '/ping', route: '/ping', status: 200 });
    expect(entry?.fields).not.toHaveProperty('client_aborted');
  });

  it('replaces a request id that is not plain', async () => {
    const res = await fetch(`${baseUrl}/ping`, { headers: { 'x-request-id': 'bad id!' } });
    await res.json();

    expect(res.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
    expect(entriesFor('bad id!')).toEqual([]);
  });

  it('logs an event stream when the viewer disconnects', async () => {
    const controller = new AbortController();
    const res = await fetch(`${baseUrl}/events`, {
      headers: { 'x-request-id': 'req-stream-1' },
      signal: controller.signal
    });
    const reader = res.body?.getReader();
    await reader?.read();
    expect(entriesFor('req-stream-1')).toEqual([]);

    controller.abort();

    await vi.waitFor(() => expect(entriesFor('req-stream-1')).toHaveLength(1));
    const [entry] = entriesFor('req-stream-1');
    expect(entry?.msg).toBe('http_stream');
    expect(entry?.fields).toMatchObject({ path: '/events', status: 200, client_aborted: true });
    expect(entry?.fields.duration_ms).toEqual(expect.any(Number));
  });
});
