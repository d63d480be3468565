import { createHash } from 'node:crypto';
import { readFileSync, statSync } from 'node:fs';
import { Client, type ClientChannel, type ConnectConfig } from 'ssh2';
import { log } from '../log.js';
import { validateCommand } from './accessGuard.js';
import { AuthFailedError, UnreachableError } from './errors.js';
import type { CommandStream, ExecOptions, ExecResult, RemoteConnection, SessionFactory } from './sessionPool.js';
import type { RemoteHost } from './types.js';

const PROBE_COMMAND = 'ls -d /';
const DEFAULT_EXEC_TIMEOUT_MS = 15_000;
const DEFAULT_EXEC_MAX_BYTES = 2_000_000;

export type Ssh2FactoryOptions = {
  connectTimeoutMs: number;
  keepaliveIntervalMs: number;
};

export function fingerprintHostKey(key: Buffer): string {
  return `SHA256:${createHash('sha256').update(key).digest('base64').replace(/=+$/, '')}`;
}

function errorLevel(error: Error): string | undefined {
  const level: unknown = Reflect.get(error, 'level');
  return typeof level === 'string' ? level : undefined;
}

async function* channelChunks(channel: ClientChannel): AsyncGenerator<Uint8Array> {
  for await (const chunk of channel) {
    if (chunk instanceof Uint8Array) {
      yield chunk;
    } else {
      yield Buffer.from(String(chunk));
    }
  }
}

class Ssh2Connection implements RemoteConnection {
  private closed = false;
  private readonly closeListeners: Array<() => void> = [];

  constructor(
    private readonly client: Client,
    private readonly hostId: string
  ) {
    client.on('close', () => this.markClosed());
    client.on('end', () => this.markClosed());
    client.on('error', (error: Error) => {
      log.warn('ssh_connection_error', { host_id: hostId, error: error.message });
      this.markClosed();
    });
  }

  exec(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_EXEC_TIMEOUT_MS;
    const maxBytes = options.maxBytes ?? DEFAULT_EXEC_MAX_BYTES;

    return new Promise<ExecResult>((resolve, reject) => {
      let settled = false;
      let stdout = '';
      let stderr = '';
      let activeChannel: ClientChannel | null = null;

      const timeout = setTimeout(() => {
        if (settled) {
          return;
        }
        settled = true;
        activeChannel?.close();
        reject(new UnreachableError(this.hostId, `remote command timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.client.exec(command, (error: Error | undefined, channel: ClientChannel) => {
        if (error) {
          settled = true;
          clearTimeout(timeout);
          reject(new UnreachableError(this.hostId, error.message));
          return;
        }
        activeChannel = channel;

        channel.on('data', (buf: Buffer) => {
          if (settled) {
            return;
          }
          stdout += buf.toString('utf8');
          if (Buffer.byteLength(stdout, 'utf8') > maxBytes) {
            settled = true;
            clearTimeout(timeout);
            channel.close();
            reject(new UnreachableError(this.hostId, `remote command output exceeds ${maxBytes} bytes`));
          }
        });

        channel.stderr.on('data', (buf: Buffer) => {
          if (!settled) {
            stderr += buf.toString('utf8');
          }
        });

        channel.on('exit', (code: number | null) => {
          if (settled) {
            return;
          }
          settled = true;
          clearTimeout(timeout);
          resolve({ stdout, stderr, code });
        });

        channel.on('close', () => {
          if (settled) {
            return;
          }
          settled = true;
          clearTimeout(timeout);
          resolve({ stdout, stderr, code: null });
        });
      });
    });
  }

  stream(command: string): Promise<CommandStream> {
    return new Promise<CommandStream>((resolve, reject) => {
      this.client.exec(command, (error: Error | undefined, channel: ClientChannel) => {
        if (error) {
          reject(new UnreachableError(this.hostId, error.message));
          return;
        }

        const iterator = channelChunks(channel);
        resolve({
          [Symbol.asyncIterator]: () => iterator,
          onStderr: (listener: (text: string) => void) => {
            channel.stderr.on('data', (buf: Buffer) => listener(buf.toString('utf8')));
          },
          close: () => {
            channel.signal('KILL');
            channel.close();
          }
        });
      });
    });
  }

  async probe(timeoutMs: number): Promise<boolean> {
    if (this.closed) {
      return false;
    }
    try {
      const result = await this.exec(PROBE_COMMAND, { timeoutMs, maxBytes: 4096 });
      return result.code === 0;
    } catch (error) {
      log.debug('ssh_probe_failed', { host_id: this.hostId, error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.client.once('close', () => resolve());
      this.client.end();
    });
  }

  private markClosed(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const listener of this.closeListeners) {
      listener();
    }
  }
}

const warnedTrustOnFirstUse = new Set<string>();

/**
 * Opens ssh2 connections for the session pool. Host keys are pinned by
 * fingerprint; accepting unknown keys needs `trustUnknownHostKeys`.
 */
export class Ssh2SessionFactory implements SessionFactory {
  constructor(private readonly options: Ssh2FactoryOptions) {
    if (!validateCommand(PROBE_COMMAND).ok) {
      throw new Error('probe command rejected by access guard');
    }
  }

  async connect(host: RemoteHost): Promise<RemoteConnection> {
    const config = this.buildConnectConfig(host);
    const client = new Client();

    return new Promise<RemoteConnection>((resolve, reject) => {
      const onReady = (): void => {
        cleanup();
        resolve(new Ssh2Connection(client, host.id));
      };

      const onError = (error: Error): void => {
        cleanup();
        client.end();
        if (errorLevel(error) === 'client-authentication') {
          reject(new AuthFailedError(host.id, error.message));
          return;
        }
        reject(new UnreachableError(host.id, error.message));
      };

      const cleanup = (): void => {
        client.removeListener('ready', onReady);
        client.removeListener('error', onError);
      };

      client.once('ready', onReady);
      client.once('error', onError);
      client.connect(config);
    });
  }

  private buildConnectConfig(host: RemoteHost): ConnectConfig {
    const config: ConnectConfig = {
      host: host.host,
      port: host.port,
      username: host.user,
      readyTimeout: this.options.connectTimeoutMs,
      keepaliveInterval: this.options.keepaliveIntervalMs,
      keepaliveCountMax: 3,
      hostVerifier: (key: Buffer): boolean => this.verifyHostKey(host, key)
    };

    if (host.authMethod === 'key') {
      if (!host.keyPath) {
        throw new AuthFailedError(host.id, 'keyPath is required for key authentication');
      }
      const mode = statSync(host.keyPath).mode;
      if (mode & 0o077) {
        log.warn('ssh_key_permissions_insecure', { host_id: host.id, key_path: host.keyPath });
      }
      config.privateKey = readFileSync(host.keyPath);
    } else {
      if (!host.password) {
        throw new AuthFailedError(host.id, 'password is required for password authentication');
      }
      config.password = host.password;
    }

    return config;
  }

  private verifyHostKey(host: RemoteHost, key: Buffer): boolean {
    const fingerprint = fingerprintHostKey(key);

    if (host.hostFingerprint) {
      const ok = host.hostFingerprint === fingerprint;
      if (!ok) {
        log.error('ssh_host_key_mismatch', { host_id: host.id, expected: host.hostFingerprint, received: fingerprint });
      }
      return ok;
    }

    if (host.trustUnknownHostKeys) {
      if (!warnedTrustOnFirstUse.has(host.id)) {
        warnedTrustOnFirstUse.add(host.id);
        log.warn('ssh_host_key_auto_accepted', { host_id: host.id, fingerprint });
      }
      return true;
    }

    log.error('ssh_host_key_unpinned', { host_id: host.id, received: fingerprint });
    return false;
  }
}
