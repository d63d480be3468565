import type { EngineErrorKind } from './errors.js';

export type AuthMethod = 'key' | 'password';

export type RemoteHost = {
  /** `host:port`, the pool key. */
  id: string;
  name: string;
  host: string;
  port: number;
  user: string;
  authMethod: AuthMethod;
  keyPath?: string;
  password?: string;
  allowedPaths: string[];
  maxFileSize: number;
  /** `SHA256:<base64>` as printed by `ssh-keygen -lf`. */
  hostFingerprint?: string;
  trustUnknownHostKeys: boolean;
};

export type SourceKind = 'local-file' | 'remote-file';

export type SourceOrigin = 'configured' | 'scanned';

type SourceBase = {
  readonly sourceId: string;
  /** Display group: configured name of the file, directory or server. */
  readonly group: string;
  readonly label: string;
  readonly path: string;
  readonly encoding: string;
  readonly alwaysOn: boolean;
  lastKnownSize: number;
  /** Last line number handed out; continues across tailer restarts. */
  lastSeq: number;
  /**
   * Byte offset a replacement tailer continues from while the source is still
   * watched; null starts over with the backlog.
   */
  resumeOffset: number | null;
};

export type LocalSource = SourceBase & {
  readonly kind: 'local-file';
  lastKnownInode: number | null;
};

export type RemoteSource = SourceBase & {
  readonly kind: 'remote-file';
  readonly host: RemoteHost;
};

export type Source = LocalSource | RemoteSource;

export type LineEvent = Readonly<{
  sourceId: string;
  seq: number;
  timestamp: string;
  content: string;
  truncated?: true;
}>;

export type RotationReason = 'inode-changed' | 'truncated' | 'reappeared';

export type HubEvent =
  | ({ type: 'line' } & LineEvent)
  | { type: 'gap'; sourceId: string; dropped: number; droppedCount: number }
  | { type: 'rotated'; sourceId: string; timestamp: string; reason: RotationReason }
  | { type: 'error'; sourceId: string; errorKind: EngineErrorKind; message: string };

export type TailerState = 'starting' | 'streaming' | 'reconnecting' | 'rotated' | 'stopped';

/**
 * Where a tailer sends its output. The hub implements this; tests pass a
 * recorder.
 */
export interface LineSink {
  publish(sourceId: string, event: LineEvent): void;
  publishRotation(sourceId: string, reason: RotationReason): void;
  publishError(sourceId: string, errorKind: EngineErrorKind, message: string): void;
}
