import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadRuntimeConfig } from './runtimeConfig.js';

describe('loadRuntimeConfig', () => {
  let dir = '';

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'tailhub-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(yaml: string): string {
    const file = path.join(dir, 'tailhub.yaml');
    writeFileSync(file, yaml);
    return file;
  }

  it('fills defaults for an empty file', () => {
    const file = writeConfig('');
    const config = loadRuntimeConfig(file, {});

    expect(config.server).toEqual({ host: '127.0.0.1', port: 8000 });
    expect(config.engine.pool.maxConnections).toBe(10);
    expect(config.engine.reconnect).toEqual({ baseDelayMs: 1_000, maxDelayMs: 30_000, jitter: true, maxAttempts: 10 });
    expect(config.engine.hub).toEqual({ queueCapacity: 5_000, replayLines: 200, heartbeatMs: 15_000 });
    expect(config.engine.tailer.maxLineLength).toBe(16_384);
    expect(config.engine.scanner).toEqual({ rescanIntervalMs: 30_000, maxFiles: 1_000 });
    expect(config.logFiles).toEqual([]);
    expect(config.remoteServers).toEqual([]);
  });

  it('applies per-entry defaults', () => {
    const file = writeConfig(`
allowedPaths: [/var/log]
logFiles:
  - name: syslog
    path: /var/log/syslog
logDirectories:
  - name: nginx
    scanDir: /var/log/nginx
remoteServers:
  - name: web-01
    host: logs.internal
    user: reader
    authMethod: password
    password: test-secret
    allowedPaths: [/var/log]
    logs:
      - name: app
        path: /var/log/app.log
`);
    const config = loadRuntimeConfig(file, {});

    expect(config.logFiles).toEqual([{ name: 'syslog', path: '/var/log/syslog', encoding: 'utf-8', alwaysOn: false }]);
    expect(config.logDirectories).toEqual([
      { name: 'nginx', scanDir: '/var/log/nginx', pattern: '*.log', recursive: false, encoding: 'utf-8', alwaysOn: false }
    ]);
    expect(config.remoteServers[0]).toMatchObject({
      port: 22,
      maxFileSize: 104_857_600,
      trustUnknownHostKeys: false,
      logs: [{ name: 'app', path: '/var/log/app.log', type: 'file', pattern: '*.log', recursive: false, alwaysOn: false }]
    });
  });

  it('lets the environment override file values', () => {
    const file = writeConfig(`
server:
  port: 9000
engine:
  hub:
    queueCapacity: 50
`);
    const config = loadRuntimeConfig(file, { PORT: '9100', HUB_QUEUE_CAPACITY: '75', POOL_MAX_CONNECTIONS: 'lots' });

    expect(config.server.port).toBe(9100);
    expect(config.engine.hub.queueCapacity).toBe(75);
    expect(config.engine.pool.maxConnections).toBe(10);
  });

  it('reports a missing file', () => {
    const missing = path.join(dir, 'absent.yaml');
    expect(() => loadRuntimeConfig(missing, {})).toThrow(`Config file not found: ${missing}`);
  });

  it('rejects unknown keys', () => {
    const file = writeConfig('listen: 0.0.0.0\n');
    expect(() => loadRuntimeConfig(file, {})).toThrow(`Invalid config file ${file}: (root): Unrecognized key(s) in object: 'listen'`);
  });

  it('requires credentials for the chosen auth method', () => {
    const file = writeConfig(`
remoteServers:
  - name: web-01
    host: logs.internal
    user: reader
    allowedPaths: [/var/log]
`);
    expect(() => loadRuntimeConfig(file, {})).toThrow('web-01: keyPath is required for key authentication');
  });

  it('rejects names that would break source ids', () => {
    const file = writeConfig(`
logFiles:
  - name: a/b
    path: /var/log/a.log
`);
    expect(() => loadRuntimeConfig(file, {})).toThrow('logFiles.0.name: name must not contain "/"');
  });

  it('rejects unknown encodings', () => {
    const file = writeConfig(`
logFiles:
  - name: app
    path: /var/log/app.log
    encoding: klingon-8
`);
    expect(() => loadRuntimeConfig(file, {})).toThrow('logFiles.0.encoding: unsupported encoding');
  });
});
