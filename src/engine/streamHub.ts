import { randomUUID } from 'node:crypto';
import { log } from '../log.js';
import type { EngineErrorKind } from './errors.js';
import { Subscriber } from './subscriber.js';
import type { HubEvent, LineEvent, LineSink, RotationReason } from './types.js';

export type HubOptions = {
  queueCapacity: number;
  /** Recent lines per source replayed to a new subscriber; 0 disables. */
  replayLines: number;
};

export type SubscriptionHandle = {
  subscriberId: string;
  sourceId: string;
};

/**
 * Fans tailer output out to subscribers. Publishing never blocks: each
 * subscriber has its own bounded queue, so a slow viewer only loses its own
 * lines.
 */
export class StreamHub implements LineSink {
  private readonly subscribers = new Map<string, Subscriber>();
  private readonly bySource = new Map<string, Set<Subscriber>>();
  private readonly recent = new Map<string, LineEvent[]>();
  private closed = false;

  constructor(private readonly options: HubOptions) {}

  subscribe(sourceId: string, subscriberId: string = randomUUID()): SubscriptionHandle {
    if (this.closed) {
      throw new Error('stream hub is closed');
    }

    let subscriber = this.subscribers.get(subscriberId);
    if (!subscriber) {
      subscriber = new Subscriber(subscriberId, this.options.queueCapacity);
      this.subscribers.set(subscriberId, subscriber);
    }

    if (!subscriber.sourceIds.has(sourceId)) {
      subscriber.sourceIds.add(sourceId);
      this.audience(sourceId).add(subscriber);
      for (const line of this.recent.get(sourceId) ?? []) {
        subscriber.enqueue(Object.freeze({ type: 'line' as const, ...line }));
      }
    }

    return { subscriberId, sourceId };
  }

  /** Returns true when this removed the subscriber's last source. */
  unsubscribe(handle: SubscriptionHandle): boolean {
    const subscriber = this.subscribers.get(handle.subscriberId);
    if (!subscriber) {
      return false;
    }

    subscriber.sourceIds.delete(handle.sourceId);
    this.bySource.get(handle.sourceId)?.delete(subscriber);

    if (subscriber.sourceIds.size === 0) {
      this.subscribers.delete(subscriber.id);
      subscriber.close();
      return true;
    }
    return false;
  }

  /** Detaches a subscriber from everything; returns the sources it held. */
  removeSubscriber(subscriberId: string): string[] {
    const subscriber = this.subscribers.get(subscriberId);
    if (!subscriber) {
      return [];
    }

    const sourceIds = Array.from(subscriber.sourceIds);
    for (const sourceId of sourceIds) {
      this.bySource.get(sourceId)?.delete(subscriber);
    }
    subscriber.sourceIds.clear();
    this.subscribers.delete(subscriberId);
    subscriber.close();

    if (subscriber.droppedCount > 0) {
      log.info('hub_subscriber_dropped_lines', { subscriber_id: subscriberId, dropped: subscriber.droppedCount });
    }
    return sourceIds;
  }

  getSubscriber(subscriberId: string): Subscriber | undefined {
    return this.subscribers.get(subscriberId);
  }

  subscriberCount(sourceId: string): number {
    return this.bySource.get(sourceId)?.size ?? 0;
  }

  publish(sourceId: string, event: LineEvent): void {
    if (this.replayEnabled()) {
      const ring = this.recent.get(sourceId) ?? [];
      ring.push(event);
      if (ring.length > this.options.replayLines) {
        ring.splice(0, ring.length - this.options.replayLines);
      }
      this.recent.set(sourceId, ring);
    }

    this.broadcast(sourceId, { type: 'line', ...event });
  }

  publishRotation(sourceId: string, reason: RotationReason): void {
    this.broadcast(sourceId, { type: 'rotated', sourceId, timestamp: new Date().toISOString(), reason });
  }

  publishError(sourceId: string, errorKind: EngineErrorKind, message: string): void {
    this.broadcast(sourceId, { type: 'error', sourceId, errorKind, message });
  }

  /** Forgets the replay buffer of a source whose tailer has stopped. */
  clearReplay(sourceId: string): void {
    this.recent.delete(sourceId);
  }

  /** Detaches every subscriber from a source that is gone; returns how many. */
  dropSource(sourceId: string): number {
    const audience = this.bySource.get(sourceId);
    this.bySource.delete(sourceId);
    this.recent.delete(sourceId);
    if (!audience) {
      return 0;
    }
    for (const subscriber of audience) {
      subscriber.sourceIds.delete(sourceId);
    }
    return audience.size;
  }

  close(): void {
    this.closed = true;
    for (const subscriber of this.subscribers.values()) {
      subscriber.close();
    }
    this.subscribers.clear();
    this.bySource.clear();
    this.recent.clear();
  }

  private replayEnabled(): boolean {
    return this.options.replayLines > 0;
  }

  private audience(sourceId: string): Set<Subscriber> {
    let audience = this.bySource.get(sourceId);
    if (!audience) {
      audience = new Set();
      this.bySource.set(sourceId, audience);
    }
    return audience;
  }

  private broadcast(sourceId: string, event: HubEvent): void {
    const audience = this.bySource.get(sourceId);
    if (!audience) {
      return;
    }
    // One frozen event is shared by every queue.
    const shared = Object.freeze(event);
    for (const subscriber of audience) {
      subscriber.enqueue(shared);
    }
  }
}
