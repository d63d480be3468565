import { log } from '../log.js';
import { errMessage } from '../http/errors.js';
import { buildFollowCommand, buildSizeCommand, checkFileSize, type RemoteCommand } from './accessGuard.js';
import { backoffDelay, pause, type BackoffPolicy } from './backoff.js';
import {
  isRetryable,
  SecurityViolationError,
  SizeExceededError,
  SourceUnavailableError,
  UnreachableError
} from './errors.js';
import { LineSplitter } from './lineSplitter.js';
import type { RemoteSession, SessionPool } from './sessionPool.js';
import { BaseTailer, type TailerOptions } from './tailer.js';
import type { LineSink, RemoteSource, RotationReason } from './types.js';

/** Maps GNU tail's stderr notices about a followed file to a rotation reason. */
export function rotationReasonOf(notice: string): RotationReason | null {
  if (notice.includes('file truncated')) {
    return 'truncated';
  }
  if (notice.includes('has been replaced')) {
    return 'inode-changed';
  }
  if (notice.includes('has appeared')) {
    return 'reappeared';
  }
  return null;
}

type SessionLease = Pick<SessionPool, 'acquire' | 'release'>;

export class RemoteTailer extends BaseTailer<RemoteSource> {
  private failures = 0;
  /** Bytes of the remote file read so far; null until the first size check. */
  private offset: number | null = null;

  constructor(
    source: RemoteSource,
    sink: LineSink,
    options: TailerOptions,
    private readonly pool: SessionLease,
    private readonly backoff: BackoffPolicy
  ) {
    super(source, sink, options);
  }

  protected async run(signal: AbortSignal): Promise<void> {
    const splitter = new LineSplitter(this.source.encoding, this.options.maxLineLength);
    this.offset = this.source.resumeOffset;

    while (!signal.aborted) {
      let session: RemoteSession | null = null;
      let broken = false;

      try {
        session = await this.pool.acquire(this.source.host);
        await this.follow(session, splitter, signal);

        if (signal.aborted) {
          break;
        }
        broken = true;
        throw new UnreachableError(this.source.host.id, 'follow stream ended');
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        if (!isRetryable(error)) {
          throw error;
        }

        broken = true;
        this.failures += 1;
        if (this.failures > this.backoff.maxAttempts) {
          throw new SourceUnavailableError(
            this.sourceId,
            `gave up after ${this.backoff.maxAttempts} reconnect attempts: ${errMessage(error)}`
          );
        }

        const delayMs = backoffDelay(this.backoff, this.failures);
        this.setState('reconnecting');
        log.warn('tailer_reconnecting', {
          source_id: this.sourceId,
          host_id: this.source.host.id,
          attempt: this.failures,
          delay_ms: delayMs,
          error: errMessage(error)
        });

        if (session) {
          this.pool.release(session, { broken });
          session = null;
        }
        if (!(await pause(delayMs, signal))) {
          break;
        }
      } finally {
        if (session) {
          this.pool.release(session, { broken });
        }
      }
    }
  }

  /**
   * Runs the follow command until its output ends. The first attempt replays
   * the backlog; later ones continue at the byte where the last stream
   * stopped, so the splitter keeps any partial line across the gap.
   */
  private async follow(session: RemoteSession, splitter: LineSplitter, signal: AbortSignal): Promise<void> {
    const { path: filePath } = this.source;
    const size = await this.remoteSize(session, this.offset !== null);
    this.source.lastKnownSize = size;

    let position: number;
    let command: RemoteCommand;
    if (this.offset === null) {
      const backlogBytes = Math.min(size, this.options.backlogBytes);
      position = size - backlogBytes;
      command = buildFollowCommand(filePath, { backlogBytes });
      if (position > 0) {
        splitter.skipFirstLine();
      }
    } else {
      position = this.offset;
      if (size < position) {
        this.rotate(splitter, 'truncated', 'shrank while disconnected');
        position = 0;
        this.track(position);
      }
      command = buildFollowCommand(filePath, { fromByte: position + 1 });
    }
    if (!command.ok) {
      throw new SecurityViolationError(command.reason, command.message);
    }

    const stream = await session.stream(command.command);
    this.track(position);
    const onAbort = (): void => stream.close();
    signal.addEventListener('abort', onAbort, { once: true });

    stream.onStderr((text) => {
      const reason = rotationReasonOf(text);
      if (reason) {
        this.rotate(splitter, reason, text.trim());
        // tail -F reads the new file from its start.
        position = 0;
        this.track(position);
      }
    });

    this.setState('streaming');
    try {
      for await (const chunk of stream) {
        this.failures = 0;
        position += chunk.byteLength;
        this.track(position);
        this.emit(splitter.push(chunk));
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      stream.close();
    }
  }

  private track(position: number): void {
    this.offset = position;
    this.source.resumeOffset = position;
  }

  private rotate(splitter: LineSplitter, reason: RotationReason, notice: string): void {
    this.emit(splitter.flush());
    log.info('tailer_rotation_detected', { source_id: this.sourceId, reason, notice });
    this.sink.publishRotation(this.sourceId, reason);
  }

  /**
   * Reads the remote file size. When resuming, a missing file counts as empty
   * (it is mid-rotation and `tail -F` waits for it) and the size limit is not
   * applied, since no backlog is read.
   */
  private async remoteSize(session: RemoteSession, resuming: boolean): Promise<number> {
    const command = buildSizeCommand(this.source.path);
    if (!command.ok) {
      throw new SecurityViolationError(command.reason, command.message);
    }

    const result = await session.exec(command.command, { maxBytes: 64 });
    const size = Number.parseInt(result.stdout.trim(), 10);
    if (result.code !== 0 || Number.isNaN(size)) {
      if (resuming) {
        return 0;
      }
      throw new SourceUnavailableError(this.sourceId, result.stderr.trim() || 'remote file not found');
    }

    const check = checkFileSize(size, this.source.host.maxFileSize);
    if (!check.ok && !resuming) {
      throw new SizeExceededError(size, this.source.host.maxFileSize);
    }
    return size;
  }
}
