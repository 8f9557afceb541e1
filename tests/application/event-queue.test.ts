import { describe, it, expect, beforeEach } from 'vitest';
import { EventQueue } from '../../src/application/event-queue.js';
import { MemoryKeyValueStore } from '../../src/infrastructure/storage/memory-store.js';
import { FIXED_NOW, FlakyStore, fakeLogger, jsonBytes, makeEvent, parseBytes } from '../helpers.js';

describe('EventQueue', () => {
  let log: ReturnType<typeof fakeLogger>;
  let storage: MemoryKeyValueStore;

  beforeEach(() => {
    log = fakeLogger();
    storage = new MemoryKeyValueStore();
  });

  function queue(maxSize?: number): EventQueue {
    return new EventQueue({ log, storage, maxSize, nowFn: () => FIXED_NOW });
  }

  function ids(q: EventQueue): string[] {
    return q.snapshot().map((item) => item.event.event_id);
  }

  it('every enqueued event survives a restart exactly once', async () => {
    const q = queue();
    await q.enqueue(makeEvent({ event_id: 'a' }));
    await q.enqueue(makeEvent({ event_id: 'b' }));
    await q.enqueue(makeEvent({ event_id: 'c' }));

    const reloaded = queue();
    expect(await reloaded.load()).toBe(3);
    expect(ids(reloaded)).toEqual(['a', 'b', 'c']);
  });

  it('wraps events with delivery metadata', async () => {
    const q = queue();
    const event = makeEvent({ event_id: 'a' });
    const result = await q.enqueue(event);

    expect(result).toEqual({ length: 1, evicted: 0, persisted: true });
    expect(q.snapshot()).toEqual([{ event, enqueued_at: FIXED_NOW, delivery_attempts: 0 }]);
  });

  it('drain() returns an ordered prefix without removing anything', async () => {
    const q = queue();
    for (const id of ['a', 'b', 'c']) await q.enqueue(makeEvent({ event_id: id }));

    const batch = await q.drain(2);

    expect(batch.map((item) => item.event.event_id)).toEqual(['a', 'b']);
    expect(q.length).toBe(3);
  });

  it('ack() removes exactly the given ids, leaving events queued after the drain', async () => {
    const q = queue();
    await q.enqueue(makeEvent({ event_id: 'a' }));
    await q.enqueue(makeEvent({ event_id: 'b' }));
    const batch = await q.drain(10);
    await q.enqueue(makeEvent({ event_id: 'late' }));

    expect(await q.ack(batch.map((item) => item.event.event_id))).toBe(2);
    expect(ids(q)).toEqual(['late']);
    expect(parseBytes(await storage.get('event_queue'))).toEqual([
      expect.objectContaining({ event: expect.objectContaining({ event_id: 'late' }) }),
    ]);
  });

  it('ack() is idempotent', async () => {
    const q = queue();
    for (const id of ['a', 'b', 'c']) await q.enqueue(makeEvent({ event_id: id }));

    await q.ack(['a', 'b']);
    const once = ids(q);
    expect(await q.ack(['a', 'b'])).toBe(0);
    expect(ids(q)).toEqual(once);
    expect(once).toEqual(['c']);
  });

  it('an earlier snapshot is unaffected by later enqueues', async () => {
    const q = queue();
    await q.enqueue(makeEvent({ event_id: 'a' }));
    const before = q.snapshot();

    await q.enqueue(makeEvent({ event_id: 'b' }));

    expect(before.map((item) => item.event.event_id)).toEqual(['a']);
    expect(ids(q)).toEqual(['a', 'b']);
  });

  it('ignores an event whose id is already queued', async () => {
    const q = queue();
    const event = makeEvent({ event_id: 'a' });
    await q.enqueue(event);
    const result = await q.enqueue(event);
    expect(result.length).toBe(1);
  });

  it('evicts the oldest events beyond the size cap', async () => {
    const q = queue(2);
    await q.enqueue(makeEvent({ event_id: 'a' }));
    await q.enqueue(makeEvent({ event_id: 'b' }));
    const result = await q.enqueue(makeEvent({ event_id: 'c' }));

    expect(result).toEqual({ length: 2, evicted: 1, persisted: true });
    expect(ids(q)).toEqual(['b', 'c']);
    expect(log.warn).toHaveBeenCalled();
  });

  it('markAttempt() counts attempts and persists them', async () => {
    const q = queue();
    await q.enqueue(makeEvent({ event_id: 'a' }));
    await q.enqueue(makeEvent({ event_id: 'b' }));

    await q.markAttempt(['a']);
    await q.markAttempt(['a']);

    const reloaded = queue();
    await reloaded.load();
    expect(reloaded.snapshot().map((item) => item.delivery_attempts)).toEqual([2, 0]);
  });

  it('drop() removes like ack and logs the reason', async () => {
    const q = queue();
    await q.enqueue(makeEvent({ event_id: 'a' }));
    expect(await q.drop(['a', 'unknown'], 'permanent_failure')).toBe(1);
    expect(q.length).toBe(0);
    expect(log.warn).toHaveBeenCalledWith({ removed: 1, reason: 'permanent_failure' }, 'Dropped queued events');
  });

  it('clear() empties memory and storage', async () => {
    const q = queue();
    await q.enqueue(makeEvent({ event_id: 'a' }));
    expect(await q.clear()).toBe(1);
    expect(parseBytes(await storage.get('event_queue'))).toEqual([]);
  });

  it('load() discards corrupt and duplicate entries individually', async () => {
    const good = { event: makeEvent({ event_id: 'good' }), enqueued_at: 1, delivery_attempts: 0 };
    await storage.put(
      'event_queue',
      jsonBytes([good, { event: { event_id: 'bad' }, enqueued_at: 1, delivery_attempts: 0 }, good, 'junk']),
    );

    const q = queue();
    expect(await q.load()).toBe(1);
    expect(ids(q)).toEqual(['good']);
    expect(parseBytes(await storage.get('event_queue'))).toEqual([good]);
  });

  it('load() drops an unparseable queue file', async () => {
    await storage.put('event_queue', new TextEncoder().encode('{not json'));
    const q = queue();
    expect(await q.load()).toBe(0);
    expect(await storage.get('event_queue')).toBeNull();
  });

  it('keeps events in memory when the store fails', async () => {
    const flaky = new FlakyStore();
    flaky.failWrites = true;
    const q = new EventQueue({ log, storage: flaky });

    const result = await q.enqueue(makeEvent({ event_id: 'a' }));

    expect(result.persisted).toBe(false);
    expect(q.length).toBe(1);
    expect(log.error).toHaveBeenCalled();
  });
});
