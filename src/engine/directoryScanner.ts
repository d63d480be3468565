import path from 'node:path';
import { glob } from 'glob';
import { log } from '../log.js';
import { errMessage } from '../http/errors.js';
import { buildListCommand } from './accessGuard.js';
import { isEngineError, SecurityViolationError, SourceUnavailableError } from './errors.js';
import type { SessionPool } from './sessionPool.js';
import { createLocalSource, createRemoteSource, relativeId } from './sources.js';
import type { RemoteHost, Source, SourceOrigin } from './types.js';

type DirectoryBase = {
  /** Configured directory name; prefix of every discovered source id. */
  name: string;
  root: string;
  pattern: string;
  recursive: boolean;
  encoding: string;
  /** Discovered files are tailed without waiting for a viewer. */
  alwaysOn: boolean;
};

export type DirectoryDefinition =
  | (DirectoryBase & { kind: 'local'; allowedPaths: readonly string[] })
  | (DirectoryBase & { kind: 'remote'; server: string; host: RemoteHost });

export type ScanResult = {
  added: string[];
  removed: string[];
};

export type ScannerRegistry = {
  addSource(source: Source, origin: SourceOrigin): Promise<boolean>;
  retireSource(sourceId: string, reason: string): Promise<boolean>;
};

export type ScannerOptions = {
  rescanIntervalMs: number;
  maxFiles: number;
};

/**
 * Keeps the registry in step with the files matching a directory pattern.
 * A listing that fails changes nothing; the next rescan tries again.
 */
export class DirectoryScanner {
  private readonly known = new Map<string, Source>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private scanning: Promise<ScanResult> | null = null;
  private stopped = false;

  constructor(
    readonly definition: DirectoryDefinition,
    private readonly registry: ScannerRegistry,
    private readonly options: ScannerOptions,
    private readonly pool?: Pick<SessionPool, 'acquire' | 'release'>
  ) {}

  get sources(): Source[] {
    return Array.from(this.known.values());
  }

  async start(): Promise<ScanResult> {
    const first = await this.scanOnce();
    if (!this.timer && !this.stopped) {
      this.timer = setInterval(() => {
        this.scanOnce().catch((error: unknown) => {
          log.error('scanner_rescan_failed', { directory: this.definition.name, error: errMessage(error) });
        });
      }, this.options.rescanIntervalMs);
      this.timer.unref();
    }
    return first;
  }

  /** Cancels rescans and waits for a scan already under way to settle. */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    try {
      await this.scanning;
    } catch (error) {
      log.warn('scanner_stop_scan_failed', { directory: this.definition.name, error: errMessage(error) });
    }
  }

  /** Lists the directory once and reconciles; overlapping calls share one scan. */
  scanOnce(): Promise<ScanResult> {
    if (this.stopped) {
      return Promise.resolve({ added: [], removed: [] });
    }
    if (!this.scanning) {
      this.scanning = this.scan().finally(() => {
        this.scanning = null;
      });
    }
    return this.scanning;
  }

  private async scan(): Promise<ScanResult> {
    const { definition } = this;

    let files: string[];
    try {
      files = await this.list();
    } catch (error) {
      log.warn('scanner_list_failed', { directory: definition.name, root: definition.root, error: errMessage(error) });
      return { added: [], removed: [] };
    }

    if (files.length > this.options.maxFiles) {
      log.warn('scanner_file_cap_reached', { directory: definition.name, found: files.length, max: this.options.maxFiles });
      files = files.slice(0, this.options.maxFiles);
    }

    const seen = new Set<string>();
    const added: string[] = [];
    if (this.stopped) {
      return { added, removed: [] };
    }

    for (const filePath of files) {
      const source = this.toSource(filePath);
      if (!source) {
        continue;
      }
      seen.add(source.sourceId);
      if (this.known.has(source.sourceId) || this.stopped) {
        continue;
      }
      if (await this.registry.addSource(source, 'scanned')) {
        this.known.set(source.sourceId, source);
        added.push(source.sourceId);
      }
    }

    const removed: string[] = [];
    if (this.stopped) {
      return { added, removed };
    }
    for (const sourceId of Array.from(this.known.keys())) {
      if (!seen.has(sourceId)) {
        this.known.delete(sourceId);
        await this.registry.retireSource(sourceId, 'file vanished from directory');
        removed.push(sourceId);
      }
    }

    if (added.length > 0 || removed.length > 0) {
      log.info('scanner_reconciled', { directory: definition.name, added: added.length, removed: removed.length });
    }
    return { added, removed };
  }

  private toSource(filePath: string): Source | null {
    const { definition } = this;
    const rel = relativeId(definition.root, filePath);
    const params = {
      group: definition.name,
      label: rel,
      path: filePath,
      encoding: definition.encoding,
      alwaysOn: definition.alwaysOn
    };

    try {
      if (definition.kind === 'local') {
        return createLocalSource({ ...params, sourceId: `${definition.name}/${rel}` }, definition.allowedPaths);
      }
      return createRemoteSource(
        { ...params, sourceId: `${definition.server}/${definition.name}/${rel}` },
        definition.host
      );
    } catch (error) {
      if (error instanceof SecurityViolationError) {
        log.warn('scanner_file_rejected', { directory: definition.name, path: filePath, reason: error.reason });
        return null;
      }
      throw error;
    }
  }

  private async list(): Promise<string[]> {
    const { definition } = this;
    const pattern = definition.recursive ? `**/${definition.pattern}` : definition.pattern;

    if (definition.kind === 'local') {
      const files = await glob(pattern, { cwd: definition.root, absolute: true, nodir: true });
      return files.sort();
    }

    if (!this.pool) {
      throw new SourceUnavailableError(definition.name, 'no session pool for remote directory');
    }

    const command = buildListCommand(definition.root, definition.pattern, definition.recursive);
    if (!command.ok) {
      throw new SecurityViolationError(command.reason, command.message);
    }

    const session = await this.pool.acquire(definition.host);
    let broken = false;
    try {
      const result = await session.exec(command.command);
      if (result.code !== 0) {
        throw new SourceUnavailableError(definition.name, result.stderr.trim() || `find exited with ${result.code}`);
      }
      return result.stdout
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => path.posix.isAbsolute(line))
        .sort();
    } catch (error) {
      broken = !isEngineError(error) || error.kind !== 'SourceUnavailable';
      throw error;
    } finally {
      this.pool.release(session, { broken });
    }
  }
}
