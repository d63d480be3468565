import type { HubEvent } from './types.js';

type GapEvent = Extract<HubEvent, { type: 'gap' }>;

/**
 * A viewer's outbound queue. Line entries are bounded by `capacity`; on
 * overflow the oldest line is dropped and folded into a gap marker at the
 * position it occupied, so the consumer sees where the discontinuity is.
 */
export class Subscriber {
  readonly sourceIds = new Set<string>();
  droppedCount = 0;
  private queue: HubEvent[] = [];
  private lineCount = 0;
  private closed = false;
  private wake: (() => void) | null = null;

  constructor(
    readonly id: string,
    private readonly capacity: number
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }

  enqueue(event: HubEvent): void {
    if (this.closed) {
      return;
    }

    if (event.type === 'line') {
      if (this.lineCount >= this.capacity) {
        this.dropOldestLine();
      }
      this.lineCount += 1;
    }

    this.queue.push(event);
    this.signal();
  }

  /** Removes and returns everything queued right now. */
  takeAll(): HubEvent[] {
    const taken = this.queue;
    this.queue = [];
    this.lineCount = 0;
    return taken;
  }

  /**
   * The delivery loop: yields queued events in order and suspends while the
   * queue is empty. Ends when the subscriber is closed.
   */
  async *events(): AsyncGenerator<HubEvent> {
    while (true) {
      const next = this.queue.shift();
      if (next) {
        if (next.type === 'line') {
          this.lineCount -= 1;
        }
        yield next;
        continue;
      }

      if (this.closed) {
        return;
      }

      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.queue = [];
    this.lineCount = 0;
    this.signal();
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private dropOldestLine(): void {
    const index = this.queue.findIndex((entry) => entry.type === 'line');
    if (index < 0) {
      return;
    }

    const dropped = this.queue[index];
    if (!dropped || dropped.type !== 'line') {
      return;
    }

    this.droppedCount += 1;
    this.lineCount -= 1;

    const previous = index > 0 ? this.queue[index - 1] : undefined;
    if (previous && previous.type === 'gap' && previous.sourceId === dropped.sourceId) {
      previous.dropped += 1;
      previous.droppedCount = this.droppedCount;
      this.queue.splice(index, 1);
      return;
    }

    const gap: GapEvent = {
      type: 'gap',
      sourceId: dropped.sourceId,
      dropped: 1,
      droppedCount: this.droppedCount
    };
    this.queue.splice(index, 1, gap);
  }
}
