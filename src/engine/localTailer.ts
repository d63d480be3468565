import { watch, type FSWatcher, type Stats } from 'node:fs';
import { open, stat, type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { log } from '../log.js';
import { SourceUnavailableError } from './errors.js';
import { LineSplitter } from './lineSplitter.js';
import { BaseTailer } from './tailer.js';
import type { LocalSource, RotationReason } from './types.js';

function isMissingFile(error: unknown): boolean {
  const code: unknown = error instanceof Error ? Reflect.get(error, 'code') : undefined;
  return code === 'ENOENT';
}

/**
 * Wakes the tailer when the file may have changed: `fs.watch` on the parent
 * directory (so a replaced file is noticed too) plus a fixed poll, since
 * watch notifications are not delivered on every filesystem.
 */
class ChangeNotifier {
  private pending = false;
  private wake: (() => void) | null = null;
  private watcher: FSWatcher | null = null;
  private readonly timer: ReturnType<typeof setInterval>;

  constructor(filePath: string, pollIntervalMs: number) {
    const base = path.basename(filePath);
    try {
      this.watcher = watch(path.dirname(filePath), { persistent: false }, (_event, filename) => {
        if (!filename || filename === base) {
          this.notify();
        }
      });
      this.watcher.on('error', (error: Error) => {
        log.debug('tailer_watch_error', { path: filePath, error: error.message });
      });
    } catch (error) {
      log.debug('tailer_watch_unavailable', { path: filePath, error: error instanceof Error ? error.message : String(error) });
    }

    this.timer = setInterval(() => this.notify(), pollIntervalMs);
    this.timer.unref();
  }

  async wait(signal: AbortSignal): Promise<void> {
    if (!this.pending && !signal.aborted) {
      await new Promise<void>((resolve) => {
        const onAbort = (): void => {
          this.wake = null;
          resolve();
        };
        this.wake = () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        };
        signal.addEventListener('abort', onAbort, { once: true });
      });
    }
    this.pending = false;
  }

  close(): void {
    clearInterval(this.timer);
    this.watcher?.close();
    this.watcher = null;
    this.notify();
  }

  private notify(): void {
    this.pending = true;
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

export class LocalTailer extends BaseTailer<LocalSource> {
  private handle: FileHandle | null = null;
  private identity: { dev: number; ino: number } | null = null;
  private offset = 0;
  private missing = false;

  protected async run(signal: AbortSignal): Promise<void> {
    const { path: filePath, encoding } = this.source;
    const splitter = new LineSplitter(encoding, this.options.maxLineLength);

    let initial: Stats;
    try {
      initial = await stat(filePath);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new SourceUnavailableError(this.sourceId, 'file not found');
      }
      throw error;
    }

    const resumeOffset = this.source.resumeOffset;
    const previousInode = this.source.lastKnownInode;
    await this.reopen(initial);
    if (resumeOffset === null) {
      this.offset = Math.max(0, initial.size - this.options.backlogBytes);
      if (this.offset > 0) {
        splitter.skipFirstLine();
      }
    } else if (previousInode !== initial.ino) {
      this.rotate(splitter, 'inode-changed');
    } else if (initial.size < resumeOffset) {
      this.rotate(splitter, 'truncated');
    } else {
      this.offset = resumeOffset;
    }

    const notifier = new ChangeNotifier(filePath, this.options.pollIntervalMs);
    this.setState('streaming');

    try {
      while (!signal.aborted) {
        await this.drain(splitter);
        await notifier.wait(signal);
      }
    } finally {
      notifier.close();
      await this.closeHandle();
    }
  }

  private async drain(splitter: LineSplitter): Promise<void> {
    let current: Stats;
    try {
      current = await stat(this.source.path);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      if (!this.missing) {
        await this.readToEnd(splitter);
        this.missing = true;
        log.info('tailer_file_missing', { source_id: this.sourceId });
      }
      return;
    }

    const identity = this.identity;
    if (this.missing || !identity || identity.dev !== current.dev || identity.ino !== current.ino) {
      // Finish what was appended to the old file before following the new one.
      if (this.handle && !this.missing) {
        await this.readToEnd(splitter);
      }
      this.rotate(splitter, this.missing ? 'reappeared' : 'inode-changed');
      await this.reopen(current);
    } else if (current.size < this.offset) {
      this.rotate(splitter, 'truncated');
    }

    await this.readToEnd(splitter);
  }

  private async readToEnd(splitter: LineSplitter): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }

    const buffer = Buffer.alloc(this.options.readChunkBytes);
    while (true) {
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, this.offset);
      if (bytesRead === 0) {
        break;
      }
      this.offset += bytesRead;
      this.emit(splitter.push(buffer.subarray(0, bytesRead)));
    }
    this.source.lastKnownSize = this.offset;
    this.source.resumeOffset = this.offset;
  }

  private rotate(splitter: LineSplitter, reason: RotationReason): void {
    this.setState('rotated');
    this.emit(splitter.flush());
    this.offset = 0;
    this.missing = false;
    log.info('tailer_rotation_detected', { source_id: this.sourceId, reason });
    this.sink.publishRotation(this.sourceId, reason);
    this.setState('streaming');
  }

  private async reopen(current: Stats): Promise<void> {
    await this.closeHandle();
    this.handle = await open(this.source.path, 'r');
    this.identity = { dev: current.dev, ino: current.ino };
    this.source.lastKnownInode = current.ino;
    this.source.lastKnownSize = current.size;
  }

  private async closeHandle(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }
}
