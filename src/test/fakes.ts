import type { EngineSettings } from '../engine/engine.js';
import type { EngineErrorKind } from '../engine/errors.js';
import type {
  CommandStream,
  ExecOptions,
  ExecResult,
  RemoteConnection,
  SessionFactory
} from '../engine/sessionPool.js';
import type { Tailer } from '../engine/tailer.js';
import type { LineEvent, LineSink, LocalSource, RemoteHost, RotationReason, TailerState } from '../engine/types.js';

export function remoteHost(overrides: Partial<RemoteHost> = {}): RemoteHost {
  return {
    id: 'logs.internal:22',
    name: 'web-01',
    host: 'logs.internal',
    port: 22,
    user: 'reader',
    authMethod: 'password',
    password: 'test-secret',
    allowedPaths: ['/var/log'],
    maxFileSize: 104_857_600,
    trustUnknownHostKeys: false,
    ...overrides
  };
}

export function localSource(sourceId: string, filePath: string, alwaysOn = false): LocalSource {
  return {
    sourceId,
    group: 'local',
    label: sourceId,
    kind: 'local-file',
    path: filePath,
    encoding: 'utf-8',
    alwaysOn,
    lastKnownSize: 0,
    lastSeq: 0,
    resumeOffset: null,
    lastKnownInode: null
  };
}

export class RecordingSink implements LineSink {
  readonly lines: LineEvent[] = [];
  readonly rotations: Array<{ sourceId: string; reason: RotationReason }> = [];
  readonly errors: Array<{ sourceId: string; errorKind: EngineErrorKind; message: string }> = [];

  publish(_sourceId: string, event: LineEvent): void {
    this.lines.push(event);
  }

  publishRotation(sourceId: string, reason: RotationReason): void {
    this.rotations.push({ sourceId, reason });
  }

  publishError(sourceId: string, errorKind: EngineErrorKind, message: string): void {
    this.errors.push({ sourceId, errorKind, message });
  }

  contents(): string[] {
    return this.lines.map((line) => line.content);
  }
}

/** A follow stream driven by the test: push output, end it, or emit stderr. */
export class FakeStream implements CommandStream {
  closed = false;
  private readonly chunks: Uint8Array[] = [];
  private ended = false;
  private wake: (() => void) | null = null;
  private readonly stderrListeners: Array<(text: string) => void> = [];

  push(text: string): this {
    this.chunks.push(Buffer.from(text, 'utf8'));
    this.signal();
    return this;
  }

  end(): this {
    this.ended = true;
    this.signal();
    return this;
  }

  emitStderr(text: string): void {
    for (const listener of this.stderrListeners) {
      listener(text);
    }
  }

  onStderr(listener: (text: string) => void): void {
    this.stderrListeners.push(listener);
  }

  close(): void {
    this.closed = true;
    this.signal();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
    while (true) {
      const chunk = this.chunks.shift();
      if (chunk) {
        yield chunk;
        continue;
      }
      if (this.ended || this.closed) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

export type FakeScript = {
  exec?: (command: string) => ExecResult | Promise<ExecResult>;
  stream?: (command: string) => FakeStream;
};

/**
 * A remote file behind `find -printf %s` and `tail -F -c`: each follow stream
 * starts at the position its command asks for, and appends reach the stream
 * that is currently open.
 */
export class FakeRemoteFile {
  private content: Buffer;
  private live: FakeStream | null = null;

  constructor(text: string) {
    this.content = Buffer.from(text, 'utf8');
  }

  script(): FakeScript {
    return {
      exec: () => ({ stdout: String(this.content.byteLength), stderr: '', code: 0 }),
      stream: (command) => {
        const stream = new FakeStream();
        const rest = this.content.subarray(this.startOf(command));
        if (rest.byteLength > 0) {
          stream.push(rest.toString('utf8'));
        }
        this.live = stream;
        return stream;
      }
    };
  }

  append(text: string): void {
    this.content = Buffer.concat([this.content, Buffer.from(text, 'utf8')]);
    this.live?.push(text);
  }

  /** Rewrites the file without telling the open stream. */
  replace(text: string): void {
    this.content = Buffer.from(text, 'utf8');
  }

  /** Ends the open stream, as a dropped connection would. */
  disconnect(): void {
    this.live?.end();
    this.live = null;
  }

  private startOf(command: string): number {
    const from = /-c \+(\d+)/.exec(command);
    if (from) {
      return Number(from[1] ?? '1') - 1;
    }
    const last = /-c (\d+)/.exec(command);
    return Math.max(0, this.content.byteLength - Number(last?.[1] ?? '0'));
  }
}

export class FakeConnection implements RemoteConnection {
  alive = true;
  closed = false;
  /** Delay before a liveness check answers. */
  answerDelayMs = 0;
  readonly commands: string[] = [];
  private readonly closeListeners: Array<() => void> = [];

  constructor(private readonly script: FakeScript) {}

  async exec(command: string, _options?: ExecOptions): Promise<ExecResult> {
    this.commands.push(command);
    const result = await this.script.exec?.(command);
    return result ?? { stdout: '', stderr: '', code: 0 };
  }

  async stream(command: string): Promise<CommandStream> {
    this.commands.push(command);
    if (!this.script.stream) {
      throw new Error('no stream scripted');
    }
    return this.script.stream(command);
  }

  async probe(_timeoutMs: number): Promise<boolean> {
    if (this.answerDelayMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.answerDelayMs));
    }
    return this.alive && !this.closed;
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Simulates the transport dropping. */
  drop(): void {
    this.closed = true;
    for (const listener of this.closeListeners) {
      listener();
    }
  }
}

export class FakeSessionFactory implements SessionFactory {
  readonly connections: FakeConnection[] = [];
  failWith: Error | null = null;

  constructor(private readonly script: FakeScript = {}) {}

  async connect(_host: RemoteHost): Promise<RemoteConnection> {
    if (this.failWith) {
      throw this.failWith;
    }
    const connection = new FakeConnection(this.script);
    this.connections.push(connection);
    return connection;
  }
}

export class FakeTailer implements Tailer {
  state: TailerState = 'stopped';
  starts = 0;
  stops = 0;

  constructor(readonly sourceId: string) {}

  start(): void {
    this.starts += 1;
    this.state = 'streaming';
  }

  async stop(): Promise<void> {
    this.stops += 1;
    this.state = 'stopped';
  }
}

export function engineSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  return {
    engine: {
      pool: {
        maxConnections: 2,
        acquireTimeoutMs: 200,
        idleTimeoutMs: 60_000,
        maxSessionAgeMs: 600_000,
        sweepIntervalMs: 60_000,
        connectTimeoutMs: 1_000,
        keepaliveIntervalMs: 10_000,
        probeTimeoutMs: 100
      },
      reconnect: { baseDelayMs: 1, maxDelayMs: 5, jitter: false, maxAttempts: 3 },
      hub: { queueCapacity: 100, replayLines: 20, heartbeatMs: 15_000 },
      tailer: { maxLineLength: 1_000, backlogBytes: 1_024, pollIntervalMs: 20, readChunkBytes: 4_096 },
      scanner: { rescanIntervalMs: 60_000, maxFiles: 100 }
    },
    allowedPaths: [],
    logFiles: [],
    logDirectories: [],
    remoteServers: [],
    ...overrides
  };
}
