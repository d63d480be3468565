import { randomUUID } from 'node:crypto';
import { log } from '../log.js';
import { EngineError, PoolExhaustedError, UnreachableError } from './errors.js';
import type { RemoteHost } from './types.js';

export type ExecResult = {
  stdout: string;
  stderr: string;
  code: number | null;
};

export type ExecOptions = {
  timeoutMs?: number;
  maxBytes?: number;
};

/** Output of a long-running remote command, consumed with `for await`. */
export interface CommandStream extends AsyncIterable<Uint8Array> {
  onStderr(listener: (text: string) => void): void;
  close(): void;
}

/** One authenticated transport connection, as produced by a factory. */
export interface RemoteConnection {
  exec(command: string, options?: ExecOptions): Promise<ExecResult>;
  stream(command: string): Promise<CommandStream>;
  /** Cheap liveness check; never rejects. */
  probe(timeoutMs: number): Promise<boolean>;
  onClose(listener: () => void): void;
  close(): Promise<void>;
}

export interface SessionFactory {
  /** Rejects with `AuthFailedError` or `UnreachableError`. */
  connect(host: RemoteHost): Promise<RemoteConnection>;
}

export type SessionState = 'idle' | 'leased' | 'closing' | 'closed';

export class RemoteSession {
  readonly id = randomUUID();
  readonly createdAt: number;
  lastUsedAt: number;
  state: SessionState = 'leased';
  healthy = true;

  constructor(
    readonly host: RemoteHost,
    private readonly connection: RemoteConnection,
    now: number
  ) {
    this.createdAt = now;
    this.lastUsedAt = now;
    connection.onClose(() => {
      this.healthy = false;
    });
  }

  exec(command: string, options?: ExecOptions): Promise<ExecResult> {
    this.assertLeased();
    return this.connection.exec(command, options);
  }

  stream(command: string): Promise<CommandStream> {
    this.assertLeased();
    return this.connection.stream(command);
  }

  probe(timeoutMs: number): Promise<boolean> {
    return this.connection.probe(timeoutMs);
  }

  close(): Promise<void> {
    return this.connection.close();
  }

  private assertLeased(): void {
    if (this.state !== 'leased') {
      throw new Error(`session ${this.id} used while ${this.state}`);
    }
  }
}

export type PoolOptions = {
  maxConnections: number;
  acquireTimeoutMs: number;
  idleTimeoutMs: number;
  maxSessionAgeMs: number;
  sweepIntervalMs: number;
  probeTimeoutMs: number;
};

export type PoolHostStats = {
  hostId: string;
  idle: number;
  leased: number;
  connecting: number;
  waiting: number;
  maxConnections: number;
};

type Waiter = {
  resolve: (session: RemoteSession) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
};

type HostSlots = {
  host: RemoteHost;
  /** Most recently used last. */
  idle: RemoteSession[];
  leased: Set<RemoteSession>;
  /** Connections being opened plus idle sessions out for a sweep probe. */
  pending: number;
  waiters: Waiter[];
};

/**
 * Bounded per-host pool of remote sessions. A session is leased to exactly one
 * caller at a time; idle ones are reused, aged out by `sweep()`, and disposed
 * when they are returned broken.
 */
export class SessionPool {
  private readonly hosts = new Map<string, HostSlots>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private sweeping = false;
  private closed = false;

  constructor(
    private readonly factory: SessionFactory,
    private readonly options: PoolOptions,
    private readonly now: () => number = Date.now
  ) {}

  start(): void {
    if (this.sweepTimer || this.closed) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        log.error('pool_sweep_failed', { error: error instanceof Error ? error.message : String(error) });
      });
    }, this.options.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  async acquire(host: RemoteHost): Promise<RemoteSession> {
    if (this.closed) {
      throw new UnreachableError(host.id, 'session pool is closed');
    }

    const slots = this.slotsFor(host);

    let candidate = slots.idle.pop();
    while (candidate) {
      const session = candidate;
      this.lease(slots, session);
      if (session.healthy && (await session.probe(this.options.probeTimeoutMs))) {
        session.lastUsedAt = this.now();
        log.debug('pool_session_reused', { host_id: host.id, session_id: session.id });
        return session;
      }
      slots.leased.delete(session);
      this.dispose(slots, session, 'probe_failed');
      candidate = slots.idle.pop();
    }

    if (this.size(slots) < this.options.maxConnections) {
      return this.open(slots);
    }

    return this.wait(slots);
  }

  /**
   * Ends a lease. A broken or unhealthy session is closed; a healthy one goes
   * to the longest-waiting acquirer or back to idle.
   */
  release(session: RemoteSession, options: { broken?: boolean } = {}): void {
    const slots = this.hosts.get(session.host.id);
    if (!slots || !slots.leased.has(session)) {
      log.warn('pool_release_unknown_session', { host_id: session.host.id, session_id: session.id, state: session.state });
      return;
    }

    slots.leased.delete(session);
    session.lastUsedAt = this.now();

    if (options.broken || !session.healthy || this.closed || this.isExpired(session)) {
      this.dispose(slots, session, options.broken ? 'broken' : 'retired');
      return;
    }

    this.makeAvailable(slots, session);
  }

  /** Closes idle sessions past their idle timeout or max age, or failing a probe. */
  async sweep(): Promise<void> {
    if (this.sweeping || this.closed) {
      return;
    }
    this.sweeping = true;

    try {
      for (const slots of this.hosts.values()) {
        const now = this.now();
        const keep: RemoteSession[] = [];

        for (const session of slots.idle) {
          if (!session.healthy) {
            this.dispose(slots, session, 'unhealthy', false);
          } else if (now - session.lastUsedAt > this.options.idleTimeoutMs) {
            this.dispose(slots, session, 'idle_timeout', false);
          } else if (now - session.createdAt > this.options.maxSessionAgeMs) {
            this.dispose(slots, session, 'max_age', false);
          } else {
            keep.push(session);
          }
        }
        slots.idle = [];

        // Sessions under check still count towards the host's cap.
        slots.pending += keep.length;
        await Promise.all(
          keep.map(async (session) => {
            const alive = await session.probe(this.options.probeTimeoutMs);
            slots.pending -= 1;

            if (alive && !this.closed) {
              this.makeAvailable(slots, session);
            } else {
              this.dispose(slots, session, 'probe_failed', false);
            }
          })
        );

        this.serveWaiters(slots);
      }
    } finally {
      this.sweeping = false;
    }
  }

  stats(): PoolHostStats[] {
    return Array.from(this.hosts.values()).map((slots) => ({
      hostId: slots.host.id,
      idle: slots.idle.length,
      leased: slots.leased.size,
      connecting: slots.pending,
      waiting: slots.waiters.length,
      maxConnections: this.options.maxConnections
    }));
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    const closing: Promise<void>[] = [];
    for (const slots of this.hosts.values()) {
      for (const waiter of slots.waiters.splice(0)) {
        clearTimeout(waiter.timer);
        waiter.reject(new UnreachableError(slots.host.id, 'session pool is closed'));
      }
      for (const session of slots.idle.splice(0)) {
        closing.push(this.closeSession(session, 'pool_closed'));
      }
      // Leased sessions are closed by release() once their tailers stop.
    }
    await Promise.all(closing);
  }

  private slotsFor(host: RemoteHost): HostSlots {
    let slots = this.hosts.get(host.id);
    if (!slots) {
      slots = { host, idle: [], leased: new Set(), pending: 0, waiters: [] };
      this.hosts.set(host.id, slots);
    }
    return slots;
  }

  private size(slots: HostSlots): number {
    return slots.idle.length + slots.leased.size + slots.pending;
  }

  private isExpired(session: RemoteSession): boolean {
    return this.now() - session.createdAt > this.options.maxSessionAgeMs;
  }

  private lease(slots: HostSlots, session: RemoteSession): void {
    session.state = 'leased';
    slots.leased.add(session);
  }

  private makeAvailable(slots: HostSlots, session: RemoteSession): void {
    const waiter = slots.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      this.lease(slots, session);
      waiter.resolve(session);
      return;
    }

    session.state = 'idle';
    slots.idle.push(session);
  }

  private async open(slots: HostSlots): Promise<RemoteSession> {
    const { host } = slots;
    slots.pending += 1;

    let connection: RemoteConnection;
    try {
      connection = await this.factory.connect(host);
    } catch (error) {
      slots.pending -= 1;
      this.serveWaiters(slots);
      log.warn('pool_connect_failed', {
        host_id: host.id,
        error: error instanceof Error ? error.message : String(error)
      });
      if (error instanceof EngineError) {
        throw error;
      }
      throw new UnreachableError(host.id, error instanceof Error ? error.message : String(error));
    }
    slots.pending -= 1;

    const session = new RemoteSession(host, connection, this.now());
    if (this.closed) {
      await this.closeSession(session, 'pool_closed');
      throw new UnreachableError(host.id, 'session pool is closed');
    }

    this.lease(slots, session);
    log.info('pool_session_opened', { host_id: host.id, session_id: session.id, size: this.size(slots) });
    return session;
  }

  private wait(slots: HostSlots): Promise<RemoteSession> {
    const timeoutMs = this.options.acquireTimeoutMs;

    return new Promise<RemoteSession>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = slots.waiters.indexOf(waiter);
          if (index >= 0) {
            slots.waiters.splice(index, 1);
          }
          log.warn('pool_exhausted', { host_id: slots.host.id, waited_ms: timeoutMs });
          reject(new PoolExhaustedError(slots.host.id, timeoutMs));
        }, timeoutMs)
      };
      slots.waiters.push(waiter);
    });
  }

  /** Opens sessions for waiters while capacity allows. */
  private serveWaiters(slots: HostSlots): void {
    while (slots.waiters.length > 0 && this.size(slots) < this.options.maxConnections && !this.closed) {
      const waiter = slots.waiters.shift();
      if (!waiter) {
        return;
      }
      clearTimeout(waiter.timer);
      this.open(slots).then(waiter.resolve, waiter.reject);
    }
  }

  private dispose(slots: HostSlots, session: RemoteSession, reason: string, serve = true): void {
    slots.idle = slots.idle.filter((candidate) => candidate !== session);
    slots.leased.delete(session);
    this.closeSession(session, reason).catch((error: unknown) => {
      log.error('pool_session_close_failed', {
        host_id: slots.host.id,
        session_id: session.id,
        error: error instanceof Error ? error.message : String(error)
      });
    });
    if (serve) {
      this.serveWaiters(slots);
    }
  }

  private async closeSession(session: RemoteSession, reason: string): Promise<void> {
    if (session.state === 'closing' || session.state === 'closed') {
      return;
    }
    session.state = 'closing';
    try {
      await session.close();
    } finally {
      session.state = 'closed';
      log.info('pool_session_closed', { host_id: session.host.id, session_id: session.id, reason });
    }
  }
}
