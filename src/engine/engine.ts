import { randomUUID } from 'node:crypto';
import { stat, truncate } from 'node:fs/promises';
import path from 'node:path';
import { log } from '../log.js';
import { errMessage } from '../http/errors.js';
import type { RuntimeConfig } from '../config/runtimeConfig.js';
import { buildTruncateCommand, validatePath } from './accessGuard.js';
import type { BackoffPolicy } from './backoff.js';
import { DirectoryScanner, type DirectoryDefinition } from './directoryScanner.js';
import { SecurityViolationError, SourceNotFoundError, SourceUnavailableError } from './errors.js';
import { LocalTailer } from './localTailer.js';
import { RemoteTailer } from './remoteTailer.js';
import { SessionPool, type PoolHostStats, type SessionFactory } from './sessionPool.js';
import { SourceRegistry, type RegistryEntryView } from './sourceRegistry.js';
import { createLocalSource, createRemoteSource } from './sources.js';
import { Ssh2SessionFactory } from './sshSession.js';
import { StreamHub } from './streamHub.js';
import type { Subscriber } from './subscriber.js';
import type { TailerOptions } from './tailer.js';
import type { LocalSource, RemoteHost, RemoteSource, Source, TailerState } from './types.js';

export type EngineSettings = Omit<RuntimeConfig, 'configFile' | 'server'>;

export type EngineDependencies = {
  sessionFactory?: SessionFactory;
  now?: () => number;
};

export type FileNode = {
  type: 'file';
  /** Source id, as accepted by the stream and clear endpoints. */
  name: string;
  label: string;
  path: string;
  source: 'local' | 'remote';
  exists: boolean;
  size?: number;
  state: TailerState;
  subscribers: number;
};

export type DirectoryNode = {
  type: 'directory';
  name: string;
  label: string;
  source: 'local' | 'remote';
  children: TreeNode[];
};

export type TreeNode = FileNode | DirectoryNode;

export type SourceSummary = {
  sourceId: string;
  kind: Source['kind'];
  group: string;
  label: string;
  path: string;
  hostId?: string;
  origin: RegistryEntryView['origin'];
  alwaysOn: boolean;
  state: TailerState;
  subscribers: number;
  lastKnownSize: number;
};

type GroupSpec = {
  name: string;
  source: 'local' | 'remote';
  /** Directory groups list files under this prefix; `null` for configured files. */
  scanner: DirectoryScanner | null;
};

function remoteHostFor(server: RuntimeConfig['remoteServers'][number]): RemoteHost {
  return {
    id: `${server.host}:${server.port}`,
    name: server.name,
    host: server.host,
    port: server.port,
    user: server.user,
    authMethod: server.authMethod,
    keyPath: server.keyPath,
    password: server.password,
    allowedPaths: server.allowedPaths,
    maxFileSize: server.maxFileSize,
    hostFingerprint: server.hostFingerprint,
    trustUnknownHostKeys: server.trustUnknownHostKeys
  };
}

function insertPath(children: TreeNode[], parts: string[], leaf: FileNode, source: 'local' | 'remote'): void {
  const [head, ...rest] = parts;
  if (head === undefined) {
    return;
  }
  if (rest.length === 0) {
    children.push(leaf);
    return;
  }

  let dir = children.find((node): node is DirectoryNode => node.type === 'directory' && node.label === head);
  if (!dir) {
    dir = { type: 'directory', name: head, label: head, source, children: [] };
    children.push(dir);
  }
  insertPath(dir.children, rest, leaf, source);
}

function sortTree(nodes: TreeNode[]): TreeNode[] {
  nodes.sort((a, b) => a.label.localeCompare(b.label));
  for (const node of nodes) {
    if (node.type === 'directory') {
      sortTree(node.children);
    }
  }
  return nodes;
}

/**
 * Process-scoped owner of the pool, hub, registry and scanners. Built once
 * from configuration; routes only talk to this class.
 */
export class TailEngine {
  readonly hub: StreamHub;
  readonly pool: SessionPool;
  readonly registry: SourceRegistry;

  private readonly tailerOptions: TailerOptions;
  private readonly backoff: BackoffPolicy;
  private readonly hosts = new Map<string, RemoteHost>();
  private readonly scanners: DirectoryScanner[] = [];
  private readonly configured: Source[] = [];
  private readonly groups: GroupSpec[] = [];
  private readonly rejected = new Map<string, SecurityViolationError>();
  private started = false;
  private closed = false;

  constructor(
    private readonly settings: EngineSettings,
    deps: EngineDependencies = {}
  ) {
    const { pool, reconnect, hub, tailer } = settings.engine;

    this.tailerOptions = tailer;
    this.backoff = reconnect;
    this.hub = new StreamHub({ queueCapacity: hub.queueCapacity, replayLines: hub.replayLines });
    this.pool = new SessionPool(
      deps.sessionFactory ??
        new Ssh2SessionFactory({ connectTimeoutMs: pool.connectTimeoutMs, keepaliveIntervalMs: pool.keepaliveIntervalMs }),
      pool,
      deps.now
    );
    this.registry = new SourceRegistry((source, sink) => {
      if (source.kind === 'local-file') {
        return new LocalTailer(source, sink, this.tailerOptions);
      }
      return new RemoteTailer(source, sink, this.tailerOptions, this.pool, this.backoff);
    }, this.hub);

    this.buildSources();
  }

  static fromConfig(config: RuntimeConfig, deps: EngineDependencies = {}): TailEngine {
    return new TailEngine(config, deps);
  }

  get isReady(): boolean {
    return this.started && !this.closed;
  }

  /** Registers configured sources and runs the first directory scans. */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;
    this.pool.start();

    for (const source of this.configured) {
      await this.registry.register(source);
    }

    const localScans: Promise<unknown>[] = [];
    for (const scanner of this.scanners) {
      const first = scanner.start();
      if (scanner.definition.kind === 'local') {
        localScans.push(first);
      } else {
        // Remote listings wait on SSH; the engine is usable before they finish.
        first.catch((error: unknown) => {
          log.error('scanner_start_failed', { directory: scanner.definition.name, error: errMessage(error) });
        });
      }
    }
    await Promise.all(localScans);

    log.info('engine_started', {
      sources: this.registry.list().length,
      scanners: this.scanners.length,
      rejected: this.rejected.size
    });
  }

  /**
   * Opens one subscription covering every requested source. Throws
   * `SourceNotFoundError` or `SecurityViolationError` before anything is
   * attached.
   */
  async subscribe(sourceIds: readonly string[]): Promise<Subscriber> {
    this.assertOpen();
    for (const sourceId of sourceIds) {
      this.resolve(sourceId);
    }

    const subscriberId = randomUUID();
    try {
      for (const sourceId of sourceIds) {
        this.hub.subscribe(sourceId, subscriberId);
        await this.registry.attach(sourceId, subscriberId);
      }
    } catch (error) {
      await this.unsubscribe(subscriberId);
      throw error;
    }

    const subscriber = this.hub.getSubscriber(subscriberId);
    if (!subscriber) {
      throw new Error('subscription closed while opening');
    }
    log.info('subscriber_attached', { subscriber_id: subscriberId, sources: sourceIds.length });
    return subscriber;
  }

  async unsubscribe(subscriberId: string): Promise<void> {
    const sourceIds = this.hub.removeSubscriber(subscriberId);
    await Promise.all(sourceIds.map((sourceId) => this.registry.detach(sourceId, subscriberId)));
    if (sourceIds.length > 0) {
      log.info('subscriber_detached', { subscriber_id: subscriberId, sources: sourceIds.length });
    }
  }

  listSources(): SourceSummary[] {
    return this.registry.list().map((entry) => ({
      sourceId: entry.source.sourceId,
      kind: entry.source.kind,
      group: entry.source.group,
      label: entry.source.label,
      path: entry.source.path,
      ...(entry.source.kind === 'remote-file' ? { hostId: entry.source.host.id } : {}),
      origin: entry.origin,
      alwaysOn: entry.alwaysOn,
      state: entry.state,
      subscribers: entry.subscribers,
      lastKnownSize: entry.source.lastKnownSize
    }));
  }

  /** The source tree shown to viewers: configured files, scanned directories, then remote servers. */
  async listFiles(): Promise<TreeNode[]> {
    const tree: TreeNode[] = [];
    const remoteByServer = new Map<string, DirectoryNode>();

    for (const group of this.groups) {
      if (group.source === 'local' && !group.scanner) {
        for (const source of this.configured) {
          if (source.kind === 'local-file') {
            tree.push(await this.fileNode(source, source.label));
          }
        }
        continue;
      }

      if (group.source === 'local' && group.scanner) {
        const children: TreeNode[] = [];
        for (const source of group.scanner.sources) {
          const leaf = await this.fileNode(source, path.posix.basename(source.label));
          insertPath(children, source.label.split('/'), leaf, 'local');
        }
        tree.push({ type: 'directory', name: group.name, label: group.name, source: 'local', children: sortTree(children) });
        continue;
      }

      let server = remoteByServer.get(group.name);
      if (!server) {
        server = { type: 'directory', name: group.name, label: group.name, source: 'remote', children: [] };
        remoteByServer.set(group.name, server);
        tree.push(server);
      }

      if (!group.scanner) {
        for (const source of this.configured) {
          if (source.kind === 'remote-file' && source.group === group.name) {
            server.children.push(await this.fileNode(source, source.label));
          }
        }
        continue;
      }

      const { definition } = group.scanner;
      const children: TreeNode[] = [];
      for (const source of group.scanner.sources) {
        const leaf = await this.fileNode(source, path.posix.basename(source.label));
        insertPath(children, source.label.split('/'), leaf, 'remote');
      }
      server.children.push({
        type: 'directory',
        name: `${group.name}/${definition.name}`,
        label: definition.name,
        source: 'remote',
        children: sortTree(children)
      });
    }

    return tree;
  }

  /** Empties the file behind a source, locally or with `truncate` on its host. */
  async clear(sourceId: string): Promise<void> {
    const source = this.resolve(sourceId);

    if (source.kind === 'local-file') {
      await this.clearLocal(source);
    } else {
      await this.clearRemote(source);
    }
    log.info('source_cleared', { source_id: sourceId, kind: source.kind });
  }

  poolStats(): PoolHostStats[] {
    return this.pool.stats();
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    await Promise.all(this.scanners.map((scanner) => scanner.stop()));
    await this.registry.close();
    this.hub.close();
    await this.pool.close();
    log.info('engine_closed');
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('engine is closed');
    }
  }

  private resolve(sourceId: string): Source {
    const rejection = this.rejected.get(sourceId);
    if (rejection) {
      throw rejection;
    }
    const entry = this.registry.get(sourceId);
    if (!entry) {
      throw new SourceNotFoundError(sourceId);
    }
    return entry.source;
  }

  private async fileNode(source: Source, label: string): Promise<FileNode> {
    const entry = this.registry.get(source.sourceId);
    const node: FileNode = {
      type: 'file',
      name: source.sourceId,
      label,
      path: source.path,
      source: source.kind === 'local-file' ? 'local' : 'remote',
      exists: true,
      state: entry?.state ?? 'stopped',
      subscribers: entry?.subscribers ?? 0
    };

    if (source.kind === 'local-file') {
      try {
        const info = await stat(source.path);
        node.size = info.size;
      } catch (error) {
        log.debug('source_stat_failed', { source_id: source.sourceId, error: errMessage(error) });
        node.exists = false;
        node.size = 0;
      }
    }
    return node;
  }

  private async clearLocal(source: LocalSource): Promise<void> {
    const check = validatePath(source.path, this.settings.allowedPaths, 'local');
    if (!check.ok) {
      throw new SecurityViolationError(check.reason, check.message);
    }
    try {
      await truncate(check.normalizedPath, 0);
    } catch (error) {
      throw new SourceUnavailableError(source.sourceId, errMessage(error));
    }
  }

  private async clearRemote(source: RemoteSource): Promise<void> {
    const check = validatePath(source.path, source.host.allowedPaths, 'remote');
    if (!check.ok) {
      throw new SecurityViolationError(check.reason, check.message);
    }
    const command = buildTruncateCommand(check.normalizedPath);
    if (!command.ok) {
      throw new SecurityViolationError(command.reason, command.message);
    }

    const session = await this.pool.acquire(source.host);
    let broken = false;
    try {
      const result = await session.exec(command.command);
      if (result.code !== 0) {
        throw new SourceUnavailableError(source.sourceId, result.stderr.trim() || `truncate exited with ${result.code}`);
      }
    } catch (error) {
      broken = !(error instanceof SourceUnavailableError);
      throw error;
    } finally {
      this.pool.release(session, { broken });
    }
  }

  private reject(sourceId: string, error: unknown): void {
    if (!(error instanceof SecurityViolationError)) {
      throw error;
    }
    this.rejected.set(sourceId, error);
    log.warn('source_rejected', { source_id: sourceId, reason: error.reason, error: error.message });
  }

  private buildSources(): void {
    const { settings } = this;
    const scannerOptions = settings.engine.scanner;

    if (settings.logFiles.length > 0) {
      this.groups.push({ name: 'local', source: 'local', scanner: null });
    }
    for (const file of settings.logFiles) {
      try {
        this.configured.push(
          createLocalSource(
            { sourceId: file.name, group: 'local', label: file.name, path: file.path, encoding: file.encoding, alwaysOn: file.alwaysOn },
            settings.allowedPaths
          )
        );
      } catch (error) {
        this.reject(file.name, error);
      }
    }

    for (const dir of settings.logDirectories) {
      const root = validatePath(dir.scanDir, settings.allowedPaths, 'local');
      if (!root.ok) {
        this.reject(dir.name, new SecurityViolationError(root.reason, root.message));
        continue;
      }
      const definition: DirectoryDefinition = {
        kind: 'local',
        name: dir.name,
        root: root.normalizedPath,
        pattern: dir.pattern,
        recursive: dir.recursive,
        encoding: dir.encoding,
        alwaysOn: dir.alwaysOn,
        allowedPaths: settings.allowedPaths
      };
      const scanner = new DirectoryScanner(definition, this.registry, scannerOptions);
      this.scanners.push(scanner);
      this.groups.push({ name: dir.name, source: 'local', scanner });
    }

    for (const server of settings.remoteServers) {
      const host = remoteHostFor(server);
      const existing = this.hosts.get(host.id);
      if (existing && existing.name !== server.name) {
        throw new Error(`remote servers "${existing.name}" and "${server.name}" both point at ${host.id}`);
      }
      this.hosts.set(host.id, host);

      const hasFiles = server.logs.some((entry) => entry.type === 'file');
      if (hasFiles) {
        this.groups.push({ name: server.name, source: 'remote', scanner: null });
      }

      for (const entry of server.logs) {
        const sourceId = `${server.name}/${entry.name}`;

        if (entry.type === 'file') {
          try {
            this.configured.push(
              createRemoteSource(
                { sourceId, group: server.name, label: entry.name, path: entry.path, encoding: entry.encoding, alwaysOn: entry.alwaysOn },
                host
              )
            );
          } catch (error) {
            this.reject(sourceId, error);
          }
          continue;
        }

        const root = validatePath(entry.path, host.allowedPaths, 'remote');
        if (!root.ok) {
          this.reject(sourceId, new SecurityViolationError(root.reason, root.message));
          continue;
        }
        const definition: DirectoryDefinition = {
          kind: 'remote',
          name: entry.name,
          server: server.name,
          host,
          root: root.normalizedPath,
          pattern: entry.pattern,
          recursive: entry.recursive,
          encoding: entry.encoding,
          alwaysOn: entry.alwaysOn
        };
        const scanner = new DirectoryScanner(definition, this.registry, scannerOptions, this.pool);
        this.scanners.push(scanner);
        this.groups.push({ name: server.name, source: 'remote', scanner });
      }
    }
  }
}
