import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventBuffer } from '../../src/application/event-buffer.js';
import type { EventBufferOptions } from '../../src/application/event-buffer.js';
import { asLogger, fakeLogger, makePayload } from '../helpers.js';
import type { FakeLogger } from '../helpers.js';

const defaults: EventBufferOptions = {
  destination: 'good',
  maxBatchBytes: 1000,
  maxBatchRecords: 3,
  timeLimitMs: 100,
  maxBufferedBytes: 10_000,
};

describe('EventBuffer', () => {
  let log: FakeLogger;

  beforeEach(() => {
    vi.useFakeTimers();
    log = fakeLogger();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function buffer(overrides: Partial<EventBufferOptions> = {}): EventBuffer {
    return new EventBuffer({ ...defaults, ...overrides }, asLogger(log), () => 1_000);
  }

  it('seals a batch as soon as it reaches the record limit', () => {
    const buf = buffer();
    buf.enqueue(makePayload());
    buf.enqueue(makePayload());
    expect(buf.pendingCount).toBe(0);

    buf.enqueue(makePayload());
    expect(buf.pendingCount).toBe(1);

    const batch = buf.takeNext();
    expect(batch?.recordCount).toBe(3);
    expect(batch?.byteSize).toBe(30);
  });

  it('seals the open batch first when the next payload would exceed the byte limit', () => {
    const buf = buffer({ maxBatchBytes: 25, maxBatchRecords: 100 });
    buf.enqueue(makePayload(10));
    buf.enqueue(makePayload(10));
    buf.enqueue(makePayload(10));

    expect(buf.pendingCount).toBe(1);
    const first = buf.takeNext();
    expect(first?.recordCount).toBe(2);
    expect(first?.byteSize).toBe(20);

    const rest = buf.drain();
    expect(rest).toHaveLength(1);
    expect(rest[0]?.recordCount).toBe(1);
  });

  it('seals a partial batch when its time limit elapses', () => {
    const buf = buffer();
    buf.enqueue(makePayload());
    expect(buf.pendingCount).toBe(0);

    vi.advanceTimersByTime(99);
    expect(buf.pendingCount).toBe(0);

    vi.advanceTimersByTime(1);
    expect(buf.pendingCount).toBe(1);
    expect(buf.takeNext()?.recordCount).toBe(1);
  });

  it('does not seal by age once closed', () => {
    const buf = buffer();
    buf.enqueue(makePayload());
    buf.close();
    vi.advanceTimersByTime(500);
    expect(buf.pendingCount).toBe(0);
    expect(buf.drain()).toHaveLength(1);
  });

  it('rejects a payload larger than a whole batch', () => {
    const buf = buffer({ maxBatchBytes: 50 });
    const result = buf.enqueue(makePayload(51));
    expect(result).toEqual({ accepted: false, reason: 'oversized' });
    expect(log.error).toHaveBeenCalledTimes(1);
    expect(buf.stats().bufferedRecords).toBe(0);
  });

  it('rejects payloads past the memory ceiling and logs the overflow once', () => {
    const buf = buffer({ maxBufferedBytes: 25, maxBatchRecords: 100 });
    expect(buf.enqueue(makePayload(10)).accepted).toBe(true);
    expect(buf.enqueue(makePayload(10)).accepted).toBe(true);

    expect(buf.enqueue(makePayload(10))).toEqual({ accepted: false, reason: 'overflow' });
    expect(buf.enqueue(makePayload(10))).toEqual({ accepted: false, reason: 'overflow' });

    expect(log.fatal).toHaveBeenCalledTimes(1);
    expect(buf.stats()).toEqual({
      destination: 'good',
      pendingBatches: 0,
      bufferedBytes: 20,
      bufferedRecords: 2,
      overflow: true,
    });
  });

  it('clears the overflow once the backlog is completed', () => {
    const buf = buffer({ maxBufferedBytes: 25, maxBatchRecords: 100 });
    buf.enqueue(makePayload(10));
    buf.enqueue(makePayload(10));
    buf.enqueue(makePayload(10));
    expect(buf.stats().overflow).toBe(true);

    const [batch] = buf.drain();
    expect(buf.stats().overflow).toBe(true);
    expect(log.warn).not.toHaveBeenCalled();

    if (!batch) throw new Error('expected a drained batch');
    buf.complete(batch);

    expect(buf.stats().overflow).toBe(false);
    expect(log.warn).toHaveBeenCalledWith(
      { destination: 'good', bufferedBytes: 0 },
      'Buffer overflow cleared',
    );
    expect(buf.enqueue(makePayload(10)).accepted).toBe(true);
  });

  it('keeps a taken batch under the memory ceiling until it is completed', () => {
    const buf = buffer({ maxBufferedBytes: 25, maxBatchRecords: 2 });
    buf.enqueue(makePayload(10));
    buf.enqueue(makePayload(10));

    const batch = buf.takeNext();
    if (!batch) throw new Error('expected a sealed batch');
    expect(buf.stats()).toMatchObject({ pendingBatches: 0, bufferedBytes: 20, bufferedRecords: 2 });
    expect(buf.enqueue(makePayload(10))).toEqual({ accepted: false, reason: 'overflow' });

    buf.complete(batch);

    expect(buf.stats()).toMatchObject({ bufferedBytes: 0, bufferedRecords: 0 });
    expect(buf.enqueue(makePayload(10))).toEqual({ accepted: true });
  });

  it('checks capacity without buffering or logging', () => {
    const buf = buffer({ maxBufferedBytes: 25, maxBatchRecords: 100 });
    buf.enqueue(makePayload(10));
    buf.enqueue(makePayload(10));

    expect(buf.checkCapacity(5)).toEqual({ accepted: true });
    expect(buf.checkCapacity(6)).toEqual({ accepted: false, reason: 'overflow' });
    expect(buf.checkCapacity(1001)).toEqual({ accepted: false, reason: 'oversized' });
    expect(buf.stats()).toMatchObject({ bufferedBytes: 20, bufferedRecords: 2, overflow: false });
    expect(log.fatal).not.toHaveBeenCalled();
    expect(log.error).not.toHaveBeenCalled();
  });

  it('drains sealed batches in FIFO order, then the open one', () => {
    const buf = buffer({ maxBatchRecords: 2 });
    for (let i = 0; i < 5; i++) buf.enqueue(makePayload());

    const batches = buf.drain();
    expect(batches.map((b) => b.id)).toEqual([1, 2, 3]);
    expect(batches.map((b) => b.recordCount)).toEqual([2, 2, 1]);
    expect(buf.pendingCount).toBe(0);
    expect(buf.stats().bufferedBytes).toBe(50);

    for (const batch of batches) buf.complete(batch);
    expect(buf.stats().bufferedBytes).toBe(0);
  });

  it('returns nothing from drain when empty', () => {
    expect(buffer().drain()).toEqual([]);
  });

  it('freezes sealed batches', () => {
    const buf = buffer({ maxBatchRecords: 1 });
    buf.enqueue(makePayload());
    const batch = buf.takeNext();
    expect(Object.isFrozen(batch)).toBe(true);
    expect(Object.isFrozen(batch?.payloads)).toBe(true);
  });

  it('notifies seal listeners until they unsubscribe', () => {
    const buf = buffer({ maxBatchRecords: 1 });
    const listener = vi.fn();
    const unsubscribe = buf.onSealed(listener);

    buf.enqueue(makePayload());
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0]?.[0]).toMatchObject({ id: 1, recordCount: 1, destination: 'good' });

    unsubscribe();
    buf.enqueue(makePayload());
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('keeps the batch when a seal listener throws', () => {
    const buf = buffer({ maxBatchRecords: 1 });
    buf.onSealed(() => {
      throw new Error('listener broke');
    });

    buf.enqueue(makePayload());

    expect(buf.pendingCount).toBe(1);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ destination: 'good', batchId: 1 }),
      'Seal listener failed',
    );
  });
});
