import { log } from '../log.js';
import { errMessage } from '../http/errors.js';
import { isEngineError } from './errors.js';
import type { SplitLine } from './lineSplitter.js';
import type { LineSink, Source, TailerState } from './types.js';

export type TailerOptions = {
  maxLineLength: number;
  /** Trailing bytes replayed when a tailer starts. */
  backlogBytes: number;
  pollIntervalMs: number;
  readChunkBytes: number;
};

export interface Tailer {
  readonly sourceId: string;
  readonly state: TailerState;
  start(): void;
  /** Resolves once the tailing task has ended and its resources are released. */
  stop(): Promise<void>;
}

/**
 * One task per source. Subclasses implement `run`, which reads until the
 * signal aborts; an error escaping `run` ends the tailer and is reported to
 * the source's subscribers.
 */
export abstract class BaseTailer<S extends Source> implements Tailer {
  private emitted = 0;
  private currentState: TailerState = 'stopped';
  private task: Promise<void> | null = null;
  private readonly controller = new AbortController();

  constructor(
    protected readonly source: S,
    protected readonly sink: LineSink,
    protected readonly options: TailerOptions
  ) {}

  get sourceId(): string {
    return this.source.sourceId;
  }

  get state(): TailerState {
    return this.currentState;
  }

  start(): void {
    if (this.task) {
      return;
    }

    this.setState('starting');
    log.info('tailer_started', { source_id: this.sourceId, kind: this.source.kind });

    this.task = this.run(this.controller.signal)
      .catch((error: unknown) => {
        if (this.controller.signal.aborted) {
          return;
        }
        log.error('tailer_failed', { source_id: this.sourceId, error: errMessage(error) });
        this.sink.publishError(this.sourceId, isEngineError(error) ? error.kind : 'SourceUnavailable', errMessage(error));
      })
      .finally(() => {
        this.setState('stopped');
        log.info('tailer_stopped', { source_id: this.sourceId, lines: this.emitted });
      });
  }

  async stop(): Promise<void> {
    this.controller.abort();
    await this.task;
  }

  protected abstract run(signal: AbortSignal): Promise<void>;

  protected setState(state: TailerState): void {
    if (state !== this.currentState) {
      log.debug('tailer_state', { source_id: this.sourceId, from: this.currentState, to: state });
      this.currentState = state;
    }
  }

  protected emit(lines: readonly SplitLine[]): void {
    for (const line of lines) {
      this.emitted += 1;
      this.source.lastSeq += 1;
      this.sink.publish(
        this.sourceId,
        Object.freeze({
          sourceId: this.sourceId,
          seq: this.source.lastSeq,
          timestamp: new Date().toISOString(),
          content: line.content,
          ...(line.truncated ? { truncated: true as const } : {})
        })
      );
    }
  }
}
