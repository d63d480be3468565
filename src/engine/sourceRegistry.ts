import { log } from '../log.js';
import { SourceNotFoundError } from './errors.js';
import type { Tailer } from './tailer.js';
import type { LineSink, Source, SourceOrigin, TailerState } from './types.js';

export type TailerFactory = (source: Source, sink: LineSink) => Tailer;

export type RegistryHub = LineSink & {
  clearReplay(sourceId: string): void;
  dropSource(sourceId: string): number;
};

type RegistryEntry = {
  source: Source;
  tailer: Tailer | null;
  subscriberIds: Set<string>;
  origin: SourceOrigin;
  retired: boolean;
  /** Tail of the per-source mutation chain. */
  lock: Promise<void>;
};

export type RegistryEntryView = {
  source: Source;
  origin: SourceOrigin;
  alwaysOn: boolean;
  state: TailerState;
  subscribers: number;
};

/**
 * Owns every known source and decides when its tailer runs: while it has a
 * subscriber or is always-on. Changes to one source run one after another.
 */
export class SourceRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private closed = false;

  constructor(
    private readonly createTailer: TailerFactory,
    private readonly hub: RegistryHub
  ) {}

  /** Adds a configured source. */
  register(source: Source): Promise<boolean> {
    return this.addSource(source, 'configured');
  }

  /** Returns false when a source with the same id is already known or the registry is closed. */
  async addSource(source: Source, origin: SourceOrigin): Promise<boolean> {
    if (this.closed || this.entries.has(source.sourceId)) {
      return false;
    }

    const entry: RegistryEntry = {
      source,
      tailer: null,
      subscriberIds: new Set(),
      origin,
      retired: false,
      lock: Promise.resolve()
    };
    this.entries.set(source.sourceId, entry);
    log.info('source_added', { source_id: source.sourceId, kind: source.kind, origin });

    await this.withLock(entry, () => this.reconcile(entry));
    return true;
  }

  /** Stops the source's tailer, tells its subscribers and forgets it. */
  async retireSource(sourceId: string, reason: string): Promise<boolean> {
    const entry = this.entries.get(sourceId);
    if (!entry) {
      return false;
    }

    this.entries.delete(sourceId);
    entry.retired = true;
    await this.withLock(entry, async () => {
      await this.stopTailer(entry);
      if (entry.subscriberIds.size > 0) {
        this.hub.publishError(sourceId, 'SourceUnavailable', `source retired: ${reason}`);
      }
      this.hub.dropSource(sourceId);
    });
    log.info('source_retired', { source_id: sourceId, reason });
    return true;
  }

  async attach(sourceId: string, subscriberId: string): Promise<void> {
    const entry = this.entries.get(sourceId);
    if (!entry) {
      throw new SourceNotFoundError(sourceId);
    }

    await this.withLock(entry, async () => {
      entry.subscriberIds.add(subscriberId);
      await this.reconcile(entry);
    });
  }

  async detach(sourceId: string, subscriberId: string): Promise<void> {
    const entry = this.entries.get(sourceId);
    if (!entry) {
      return;
    }

    await this.withLock(entry, async () => {
      entry.subscriberIds.delete(subscriberId);
      await this.reconcile(entry);
    });
  }

  has(sourceId: string): boolean {
    return this.entries.has(sourceId);
  }

  get(sourceId: string): RegistryEntryView | undefined {
    const entry = this.entries.get(sourceId);
    return entry ? this.view(entry) : undefined;
  }

  list(): RegistryEntryView[] {
    return Array.from(this.entries.values(), (entry) => this.view(entry));
  }

  async close(): Promise<void> {
    this.closed = true;
    const entries = Array.from(this.entries.values());
    this.entries.clear();
    await Promise.all(
      entries.map((entry) => {
        entry.retired = true;
        return this.withLock(entry, () => this.stopTailer(entry));
      })
    );
  }

  private view(entry: RegistryEntry): RegistryEntryView {
    return {
      source: entry.source,
      origin: entry.origin,
      alwaysOn: entry.source.alwaysOn,
      state: entry.tailer?.state ?? 'stopped',
      subscribers: entry.subscriberIds.size
    };
  }

  private withLock(entry: RegistryEntry, task: () => Promise<void>): Promise<void> {
    const run = entry.lock.then(task);
    // Failures reach the caller through `run`; the chain itself keeps going.
    entry.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async reconcile(entry: RegistryEntry): Promise<void> {
    const wanted = !entry.retired && (entry.subscriberIds.size > 0 || entry.source.alwaysOn);

    if (!wanted) {
      await this.stopTailer(entry);
      return;
    }

    if (entry.tailer && entry.tailer.state !== 'stopped') {
      return;
    }

    // A tailer that ended on its own (unrecoverable error) is replaced. The
    // replacement continues where it stopped, so current viewers see no repeats.
    await this.stopTailer(entry, { keepPosition: true });
    const tailer = this.createTailer(entry.source, this.hub);
    entry.tailer = tailer;
    tailer.start();
  }

  /**
   * Without `keepPosition` the source is no longer watched: its replay buffer
   * and read position go, and the next tailer starts from the backlog.
   */
  private async stopTailer(entry: RegistryEntry, options: { keepPosition?: boolean } = {}): Promise<void> {
    const tailer = entry.tailer;
    if (!tailer) {
      return;
    }
    entry.tailer = null;
    await tailer.stop();
    if (!options.keepPosition) {
      entry.source.resumeOffset = null;
      this.hub.clearReplay(entry.source.sourceId);
    }
  }
}
