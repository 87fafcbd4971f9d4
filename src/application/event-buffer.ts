import type { Logger } from 'pino';
import type { Batch, Destination, Payload } from '../domain/index.js';

export interface EventBufferOptions {
  destination: Destination;
  maxBatchBytes: number;
  maxBatchRecords: number;
  /** Age after which an open batch is sealed even if it is not full. */
  timeLimitMs: number;
  /** Ceiling on buffered bytes (open, pending and taken but unfinished) before enqueue starts rejecting. */
  maxBufferedBytes: number;
}

export type EnqueueResult =
  | { accepted: true }
  | { accepted: false; reason: 'overflow' | 'oversized' };

export interface BufferStats {
  destination: Destination;
  pendingBatches: number;
  bufferedBytes: number;
  bufferedRecords: number;
  overflow: boolean;
}

export type SealListener = (batch: Batch) => void;

interface OpenBatch {
  id: number;
  payloads: Payload[];
  byteSize: number;
  openedAt: number;
  timer: ReturnType<typeof setTimeout> | null;
}

/**
 * Accumulates payloads for one destination and releases sealed batches.
 *
 * A batch is sealed when the next payload would push it over the byte or
 * record limit, when it reaches the record limit exactly, or when its age
 * reaches `timeLimitMs`. Sealed batches wait in FIFO order until the
 * dispatch loop takes them. A taken batch keeps counting against the
 * memory ceiling until the loop reports it finished through `complete()`.
 *
 * `enqueue()` is synchronous and never touches the network, so concurrent
 * request handlers are serialized by the event loop: there is never more
 * than one open batch.
 */
export class EventBuffer {
  readonly destination: Destination;
  private readonly options: EventBufferOptions;
  private readonly log: Logger;
  private readonly now: () => number;

  private open: OpenBatch | null = null;
  private readonly pending: Batch[] = [];
  private readonly listeners = new Set<SealListener>();
  private nextBatchId = 1;
  private bufferedBytes = 0;
  private bufferedRecords = 0;
  private overflowing = false;
  private closed = false;

  constructor(options: EventBufferOptions, log: Logger, now: () => number = Date.now) {
    this.destination = options.destination;
    this.options = options;
    this.log = log;
    this.now = now;
  }

  /** Whether a payload of `size` bytes would be accepted right now. Buffers nothing. */
  checkCapacity(size: number): EnqueueResult {
    if (size > this.options.maxBatchBytes) return { accepted: false, reason: 'oversized' };
    if (this.bufferedBytes + size > this.options.maxBufferedBytes) return { accepted: false, reason: 'overflow' };
    return { accepted: true };
  }

  enqueue(payload: Payload): EnqueueResult {
    const size = payload.bytes.byteLength;
    const capacity = this.checkCapacity(size);

    if (!capacity.accepted && capacity.reason === 'oversized') {
      this.log.error(
        { destination: this.destination, size, maxBatchBytes: this.options.maxBatchBytes },
        'Payload larger than a whole batch, rejected',
      );
      return capacity;
    }

    if (!capacity.accepted) {
      if (!this.overflowing) {
        this.overflowing = true;
        this.log.fatal(
          {
            destination: this.destination,
            bufferedBytes: this.bufferedBytes,
            maxBufferedBytes: this.options.maxBufferedBytes,
            pendingBatches: this.pending.length,
          },
          'Buffer overflow: memory ceiling reached, rejecting payloads until the backlog drains',
        );
      }
      return capacity;
    }

    const current = this.open;
    if (
      current
      && (current.byteSize + size > this.options.maxBatchBytes
        || current.payloads.length + 1 > this.options.maxBatchRecords)
    ) {
      this.sealOpen();
    }

    const batch = this.open ?? this.openBatch();
    batch.payloads.push(payload);
    batch.byteSize += size;
    this.bufferedBytes += size;
    this.bufferedRecords += 1;

    if (batch.payloads.length >= this.options.maxBatchRecords) {
      this.sealOpen();
    }

    return { accepted: true };
  }

  /** Removes and returns the oldest sealed batch. */
  takeNext(): Batch | undefined {
    return this.pending.shift();
  }

  /**
   * Seals the open batch (if non-empty) and hands over every pending batch
   * in FIFO order. Used during shutdown.
   */
  drain(): Batch[] {
    this.sealOpen();
    return this.pending.splice(0, this.pending.length);
  }

  /** Releases a taken batch from the memory ceiling once it was delivered or abandoned. */
  complete(batch: Batch): void {
    this.bufferedBytes -= batch.byteSize;
    this.bufferedRecords -= batch.recordCount;

    if (this.overflowing && this.bufferedBytes < this.options.maxBufferedBytes) {
      this.overflowing = false;
      this.log.warn(
        { destination: this.destination, bufferedBytes: this.bufferedBytes },
        'Buffer overflow cleared',
      );
    }
  }

  /** Registers a listener for sealed batches. Returns an unsubscribe function. */
  onSealed(listener: SealListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Number of sealed batches waiting for the dispatch loop. */
  get pendingCount(): number {
    return this.pending.length;
  }

  stats(): BufferStats {
    return {
      destination: this.destination,
      pendingBatches: this.pending.length,
      bufferedBytes: this.bufferedBytes,
      bufferedRecords: this.bufferedRecords,
      overflow: this.overflowing,
    };
  }

  /** Stops the age timer. Payloads still enqueued afterwards are sealed by `drain()`. */
  close(): void {
    this.closed = true;
    if (this.open?.timer) {
      clearTimeout(this.open.timer);
      this.open.timer = null;
    }
  }

  private openBatch(): OpenBatch {
    const batch: OpenBatch = {
      id: this.nextBatchId++,
      payloads: [],
      byteSize: 0,
      openedAt: this.now(),
      timer: null,
    };

    if (!this.closed) {
      const id = batch.id;
      batch.timer = setTimeout(() => {
        if (this.open?.id === id) {
          this.log.debug({ destination: this.destination, batchId: id }, 'Batch time limit reached');
          this.sealOpen();
        }
      }, this.options.timeLimitMs);
      batch.timer.unref();
    }

    this.open = batch;
    return batch;
  }

  private sealOpen(): void {
    const current = this.open;
    if (!current) return;
    this.open = null;

    if (current.timer) clearTimeout(current.timer);
    if (current.payloads.length === 0) return;

    const sealed: Batch = Object.freeze({
      id: current.id,
      destination: this.destination,
      payloads: Object.freeze([...current.payloads]),
      byteSize: current.byteSize,
      recordCount: current.payloads.length,
      openedAt: current.openedAt,
      sealedAt: this.now(),
    });

    this.pending.push(sealed);

    for (const listener of this.listeners) {
      try {
        listener(sealed);
      } catch (err: unknown) {
        this.log.error({ err, destination: this.destination, batchId: sealed.id }, 'Seal listener failed');
      }
    }
  }
}
