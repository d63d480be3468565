import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeConnection, FakeTailer, remoteHost } from '../test/fakes.js';
import { DirectoryScanner, type DirectoryDefinition } from './directoryScanner.js';
import { RemoteSession } from './sessionPool.js';
import { SourceRegistry } from './sourceRegistry.js';
import type { ExecResult } from './sessionPool.js';
import type { Source } from './types.js';

function registryWithTailers(): { registry: SourceRegistry; tailers: Map<string, FakeTailer[]> } {
  const tailers = new Map<string, FakeTailer[]>();
  const registry = new SourceRegistry(
    (source: Source) => {
      const tailer = new FakeTailer(source.sourceId);
      tailers.set(source.sourceId, [...(tailers.get(source.sourceId) ?? []), tailer]);
      return tailer;
    },
    { publish: vi.fn(), publishRotation: vi.fn(), publishError: vi.fn(), clearReplay: vi.fn(), dropSource: vi.fn() }
  );
  return { registry, tailers };
}

const scannerOptions = { rescanIntervalMs: 60_000, maxFiles: 100 };

describe('DirectoryScanner (local)', () => {
  let root = '';

  beforeEach(() => {
    root = realpathSync(mkdtempSync(path.join(tmpdir(), 'scanner-')));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function definition(
    overrides: { name?: string; pattern?: string; recursive?: boolean; alwaysOn?: boolean } = {}
  ): DirectoryDefinition {
    return {
      kind: 'local',
      name: overrides.name ?? 'logs',
      root,
      pattern: overrides.pattern ?? '*.log',
      recursive: overrides.recursive ?? false,
      encoding: 'utf-8',
      alwaysOn: overrides.alwaysOn ?? false,
      allowedPaths: [root]
    };
  }

  it('adds new files without restarting the tailers of known ones', async () => {
    const { registry, tailers } = registryWithTailers();
    writeFileSync(path.join(root, 'a.log'), 'a\n');
    writeFileSync(path.join(root, 'notes.txt'), 'ignored\n');
    const scanner = new DirectoryScanner(definition(), registry, scannerOptions);

    expect(await scanner.scanOnce()).toEqual({ added: ['logs/a.log'], removed: [] });
    await registry.attach('logs/a.log', 'viewer');

    writeFileSync(path.join(root, 'b.log'), 'b\n');
    expect(await scanner.scanOnce()).toEqual({ added: ['logs/b.log'], removed: [] });

    expect(tailers.get('logs/a.log')).toHaveLength(1);
    expect(tailers.get('logs/a.log')?.[0]).toMatchObject({ starts: 1, stops: 0 });
    expect(registry.get('logs/b.log')).toMatchObject({ origin: 'scanned', state: 'stopped' });
  });

  it('starts tailing new files of an always-on directory on the next scan', async () => {
    const { registry, tailers } = registryWithTailers();
    writeFileSync(path.join(root, 'a.log'), 'a\n');
    const scanner = new DirectoryScanner(definition({ alwaysOn: true }), registry, scannerOptions);
    await scanner.scanOnce();
    expect(tailers.get('logs/a.log')?.[0]?.state).toBe('streaming');

    writeFileSync(path.join(root, 'b.log'), 'b\n');
    expect(await scanner.scanOnce()).toEqual({ added: ['logs/b.log'], removed: [] });

    expect(tailers.get('logs/b.log')?.[0]?.state).toBe('streaming');
    expect(tailers.get('logs/a.log')).toHaveLength(1);
    expect(tailers.get('logs/a.log')?.[0]).toMatchObject({ starts: 1, stops: 0 });
  });

  it('changes nothing when the directory is unchanged', async () => {
    const { registry } = registryWithTailers();
    writeFileSync(path.join(root, 'a.log'), 'a\n');
    const scanner = new DirectoryScanner(definition(), registry, scannerOptions);

    await scanner.scanOnce();
    expect(await scanner.scanOnce()).toEqual({ added: [], removed: [] });
  });

  it('retires files that vanished', async () => {
    const { registry, tailers } = registryWithTailers();
    writeFileSync(path.join(root, 'a.log'), 'a\n');
    const scanner = new DirectoryScanner(definition(), registry, scannerOptions);
    await scanner.scanOnce();
    await registry.attach('logs/a.log', 'viewer');

    rmSync(path.join(root, 'a.log'));
    expect(await scanner.scanOnce()).toEqual({ added: [], removed: ['logs/a.log'] });
    expect(tailers.get('logs/a.log')?.[0]?.stops).toBe(1);
    expect(registry.has('logs/a.log')).toBe(false);
  });

  it('descends into subdirectories when recursive', async () => {
    const { registry } = registryWithTailers();
    mkdirSync(path.join(root, 'nginx'));
    writeFileSync(path.join(root, 'nginx', 'access.log'), 'x\n');
    writeFileSync(path.join(root, 'top.log'), 'y\n');

    const flat = new DirectoryScanner(definition(), registry, scannerOptions);
    expect((await flat.scanOnce()).added).toEqual(['logs/top.log']);

    const deep = new DirectoryScanner(definition({ name: 'all', recursive: true }), registry, scannerOptions);
    expect((await deep.scanOnce()).added).toEqual(['all/nginx/access.log', 'all/top.log']);
    expect(registry.get('all/nginx/access.log')?.source.label).toBe('nginx/access.log');
  });

  it('skips files the access guard rejects', async () => {
    const { registry } = registryWithTailers();
    writeFileSync(path.join(root, 'server.key.log'), 'fine\n');
    writeFileSync(path.join(root, 'leaked.pem'), 'no\n');
    const scanner = new DirectoryScanner(definition({ pattern: '*' }), registry, scannerOptions);

    expect((await scanner.scanOnce()).added).toEqual(['logs/server.key.log']);
  });

  it('caps the number of files taken from one listing', async () => {
    const { registry } = registryWithTailers();
    for (const name of ['a.log', 'b.log', 'c.log']) {
      writeFileSync(path.join(root, name), 'x\n');
    }
    const scanner = new DirectoryScanner(definition(), registry, { ...scannerOptions, maxFiles: 2 });

    expect((await scanner.scanOnce()).added).toEqual(['logs/a.log', 'logs/b.log']);
  });
});

describe('DirectoryScanner (remote)', () => {
  const host = remoteHost({ allowedPaths: ['/var/log'] });

  function poolReturning(result: () => ExecResult): {
    pool: { acquire: () => Promise<RemoteSession>; release: ReturnType<typeof vi.fn> };
    connection: FakeConnection;
  } {
    const connection = new FakeConnection({ exec: result });
    return {
      connection,
      pool: {
        acquire: async () => new RemoteSession(host, connection, Date.now()),
        release: vi.fn()
      }
    };
  }

  const definition: DirectoryDefinition = {
    kind: 'remote',
    name: 'nginx',
    server: 'web-01',
    host,
    root: '/var/log/nginx',
    pattern: '*.log',
    recursive: false,
    encoding: 'utf-8',
    alwaysOn: false
  };

  it('lists files with find over a pooled session', async () => {
    const { registry } = registryWithTailers();
    const { pool, connection } = poolReturning(() => ({
      stdout: '/var/log/nginx/error.log\n/var/log/nginx/access.log\n',
      stderr: '',
      code: 0
    }));
    const scanner = new DirectoryScanner(definition, registry, scannerOptions, pool);

    expect(await scanner.scanOnce()).toEqual({
      added: ['web-01/nginx/access.log', 'web-01/nginx/error.log'],
      removed: []
    });
    expect(connection.commands).toEqual(["find '/var/log/nginx' -maxdepth 1 -type f -name '*.log'"]);
    expect(pool.release).toHaveBeenCalledWith(expect.any(RemoteSession), { broken: false });
    expect(registry.get('web-01/nginx/access.log')?.source.kind).toBe('remote-file');
  });

  it('keeps known files when a listing fails', async () => {
    const { registry } = registryWithTailers();
    let fail = false;
    const { pool } = poolReturning(() =>
      fail
        ? { stdout: '', stderr: 'find: Permission denied', code: 1 }
        : { stdout: '/var/log/nginx/access.log\n', stderr: '', code: 0 }
    );
    const scanner = new DirectoryScanner(definition, registry, scannerOptions, pool);

    await scanner.scanOnce();
    fail = true;
    expect(await scanner.scanOnce()).toEqual({ added: [], removed: [] });
    expect(registry.has('web-01/nginx/access.log')).toBe(true);
  });
});
