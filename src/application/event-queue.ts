import type { Logger } from 'pino';
import type { AnalyticsEvent, QueuedEvent } from '../domain/index.js';
import type { KeyValueStore } from './ports.js';
import { queuedEventSchema } from './event-schema.js';
import { StorageKeys, readJson, writeRecord } from './persistence.js';
import { SerialLane } from './serial-lane.js';

export const DEFAULT_MAX_QUEUE_SIZE = 1000;

export interface EventQueueOptions {
  readonly log: Logger;
  readonly storage: KeyValueStore;
  /** Hard cap; the oldest events are evicted beyond it. */
  readonly maxSize?: number;
  readonly nowFn?: () => number;
}

export interface EnqueueResult {
  readonly length: number;
  readonly evicted: number;
  readonly persisted: boolean;
}

/**
 * Durable FIFO of events waiting for delivery.
 *
 * Write-through: every mutation is persisted under `event_queue` before
 * its promise resolves. `drain` peeks; only `ack`/`drop` remove, and only
 * the exact ids given.
 */
export class EventQueue {
  private readonly log: Logger;
  private readonly storage: KeyValueStore;
  private readonly maxSize: number;
  private readonly nowFn: () => number;
  private readonly lane = new SerialLane();
  private items: QueuedEvent[] = [];

  constructor(options: EventQueueOptions) {
    this.log = options.log;
    this.storage = options.storage;
    this.maxSize = Math.max(1, options.maxSize ?? DEFAULT_MAX_QUEUE_SIZE);
    this.nowFn = options.nowFn ?? Date.now;
  }

  /**
   * Replaces the in-memory queue with the persisted one.
   *
   * Entries that fail validation are discarded one by one; duplicate ids
   * keep their first occurrence.
   */
  load(): Promise<number> {
    return this.lane.run(async () => {
      const raw = await readJson(this.storage, StorageKeys.eventQueue, this.log);
      if (raw === undefined) {
        this.items = [];
        return 0;
      }
      if (!Array.isArray(raw)) {
        this.log.warn({ key: StorageKeys.eventQueue }, 'Discarding persisted queue: not a list');
        this.items = [];
        await this.persist();
        return 0;
      }

      const seen = new Set<string>();
      const loaded: QueuedEvent[] = [];
      let discarded = 0;
      for (const entry of raw) {
        const parsed = queuedEventSchema.safeParse(entry);
        if (!parsed.success || seen.has(parsed.data.event.event_id)) {
          discarded++;
          continue;
        }
        seen.add(parsed.data.event.event_id);
        loaded.push(parsed.data);
      }

      this.items = loaded;
      const evicted = this.evictOverflow();
      if (discarded > 0 || evicted > 0) {
        this.log.warn({ discarded, evicted }, 'Dropped invalid or overflowing queued events');
        await this.persist();
      }
      this.log.info({ length: this.items.length }, 'Event queue loaded');
      return this.items.length;
    });
  }

  /** Appends an event and persists the queue before resolving. */
  enqueue(event: AnalyticsEvent): Promise<EnqueueResult> {
    return this.lane.run(async () => {
      if (this.items.some((item) => item.event.event_id === event.event_id)) {
        this.log.debug({ event_id: event.event_id }, 'Event already queued');
        return { length: this.items.length, evicted: 0, persisted: true };
      }

      this.items = [...this.items, { event, enqueued_at: this.nowFn(), delivery_attempts: 0 }];
      const evicted = this.evictOverflow();
      if (evicted > 0) {
        this.log.warn({ evicted, maxSize: this.maxSize }, 'Queue full, evicted oldest events');
      }

      const persisted = await this.persist();
      return { length: this.items.length, evicted, persisted };
    });
  }

  /** Ordered prefix of at most `maxCount` events. Nothing is removed. */
  drain(maxCount: number): Promise<QueuedEvent[]> {
    return this.lane.run(() => this.items.slice(0, Math.max(0, maxCount)));
  }

  /**
   * Removes exactly the given ids after a successful delivery.
   * Unknown ids are ignored, so repeating an ack is a no-op.
   */
  ack(ids: Iterable<string>): Promise<number> {
    return this.lane.run(() => this.removeLocked(new Set(ids)));
  }

  /** Removes events that will never be delivered. Same semantics as `ack`. */
  drop(ids: Iterable<string>, reason: string): Promise<number> {
    return this.lane.run(async () => {
      const removed = await this.removeLocked(new Set(ids));
      if (removed > 0) {
        this.log.warn({ removed, reason }, 'Dropped queued events');
      }
      return removed;
    });
  }

  /** Counts one delivery attempt against each given event. */
  markAttempt(ids: Iterable<string>): Promise<void> {
    return this.lane.run(async () => {
      const wanted = new Set(ids);
      let changed = false;
      this.items = this.items.map((item) => {
        if (!wanted.has(item.event.event_id)) return item;
        changed = true;
        return { ...item, delivery_attempts: item.delivery_attempts + 1 };
      });
      if (changed) await this.persist();
    });
  }

  /** Removes everything (e.g. analytics consent revoked). */
  clear(): Promise<number> {
    return this.lane.run(async () => {
      const removed = this.items.length;
      this.items = [];
      await this.persist();
      if (removed > 0) this.log.info({ removed }, 'Event queue cleared');
      return removed;
    });
  }

  /** Cached length; does not wait for pending mutations. */
  get length(): number {
    return this.items.length;
  }

  /** Current contents. Mutations replace the array, so a snapshot never changes afterwards. */
  snapshot(): readonly QueuedEvent[] {
    return this.items;
  }

  settled(): Promise<void> {
    return this.lane.idle();
  }

  private async removeLocked(ids: ReadonlySet<string>): Promise<number> {
    const before = this.items.length;
    this.items = this.items.filter((item) => !ids.has(item.event.event_id));
    const removed = before - this.items.length;
    if (removed > 0) await this.persist();
    return removed;
  }

  private evictOverflow(): number {
    const overflow = this.items.length - this.maxSize;
    if (overflow <= 0) return 0;
    this.items = this.items.slice(overflow);
    return overflow;
  }

  private persist(): Promise<boolean> {
    return writeRecord(this.storage, StorageKeys.eventQueue, this.items, this.log);
  }
}
