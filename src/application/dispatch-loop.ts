import type { Logger } from 'pino';
import type { Batch, BadRowReason, Destination, Payload } from '../domain/index.js';
import { byteSizeOf } from '../domain/index.js';
import type { FlushOutcome, Sink } from '../infrastructure/sinks/types.js';
import type { BackoffPolicy } from './backoff-policy.js';
import type { EventBuffer } from './event-buffer.js';
import type { OutageMonitor } from './outage-monitor.js';
import { sleep as defaultSleep } from './sleep.js';

export type DispatchState = 'idle' | 'flushing' | 'backoff' | 'paused' | 'abandoned' | 'stopped';

/** Receives payloads this loop could not deliver. */
export type DivertHandler = (payloads: readonly Payload[], reason: BadRowReason, message: string) => void;

export interface DispatchLoopDeps {
  buffer: EventBuffer;
  sink: Sink;
  monitor: OutageMonitor;
  policy: BackoffPolicy;
  log: Logger;
  divert: DivertHandler;
  /** Called if the loop itself breaks; the process cannot trust its state after that. */
  onFatal?: (err: unknown) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
}

export interface DispatchStats {
  destination: Destination;
  state: DispatchState;
  deliveredBatches: number;
  deliveredRecords: number;
  abandonedBatches: number;
  inFlightRecords: number;
}

/** Retry bookkeeping for the batch being written. */
interface RetryState {
  attempt: number;
  elapsedMs: number;
}

/**
 * Drives one destination: takes sealed batches from its buffer in FIFO
 * order and writes them to the sink, one flush at a time.
 *
 * Retryable failures wait out the backoff policy; once the cumulative wait
 * would pass the ceiling the batch is abandoned and its payloads diverted.
 * While the outage monitor reports the sink unhealthy the loop holds the
 * batch instead of sleeping. The held time is not counted, but each failed
 * attempt is charged its scheduled delay either way, so a sink that fails
 * every write while its probe passes still exhausts the budget. Fatal
 * outcomes are abandoned at once.
 */
export class DispatchLoop {
  readonly destination: Destination;
  private readonly deps: DispatchLoopDeps;
  private readonly log: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>;
  private readonly ac = new AbortController();

  private currentState: DispatchState = 'idle';
  private started = false;
  private stopped = false;
  private inFlight: Batch | null = null;
  private outstanding: Promise<FlushOutcome> | null = null;
  private delivering: Promise<void> | null = null;
  private readonly drained: Batch[] = [];
  private wake: (() => void) | null = null;
  private readonly idleWaiters = new Set<() => void>();
  private unsubscribe: (() => void) | null = null;

  private deliveredBatches = 0;
  private deliveredRecords = 0;
  private abandonedBatches = 0;

  constructor(deps: DispatchLoopDeps) {
    this.deps = deps;
    this.destination = deps.buffer.destination;
    this.log = deps.log.child({ destination: this.destination, sink: deps.sink.name });
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get state(): DispatchState {
    return this.currentState;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.unsubscribe = this.deps.buffer.onSealed(() => this.notify());

    this.run().catch((err: unknown) => {
      this.log.fatal({ err }, 'Dispatch loop crashed');
      this.stop();
      this.deps.onFatal?.(err);
    });
  }

  /**
   * Hands every buffered payload to the loop and resolves once it has
   * delivered or abandoned all of it (or was stopped).
   */
  drain(): Promise<void> {
    this.drained.push(...this.deps.buffer.drain());
    this.notify();

    if (!this.started || this.stopped || (!this.hasWork() && this.inFlight === null)) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.add(resolve);
    });
  }

  /**
   * Stops taking new batches and cancels backoff and health waits. A flush
   * already handed to the sink finishes on its own.
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.currentState = 'stopped';
    this.ac.abort();
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.deps.buffer.close();
    this.notify();
    this.resolveIdle();
  }

  /**
   * Resolves once the current delivery attempt has finished, or at once
   * when none is running. After `stop()` that is as soon as an outstanding
   * flush returns.
   */
  settled(): Promise<void> {
    return this.delivering ?? Promise.resolve();
  }

  /** The batch whose flush the sink still has to answer; its outcome is unknown. */
  outstandingBatch(): Batch | null {
    return this.outstanding ? this.inFlight : null;
  }

  /**
   * Everything known not to be delivered: a held batch, drained batches,
   * then the buffer's. A batch with an outstanding flush is not included.
   */
  undelivered(): Batch[] {
    const held = this.inFlight && !this.outstanding ? [this.inFlight] : [];
    return [...held, ...this.drained, ...this.deps.buffer.drain()];
  }

  stats(): DispatchStats {
    return {
      destination: this.destination,
      state: this.currentState,
      deliveredBatches: this.deliveredBatches,
      deliveredRecords: this.deliveredRecords,
      abandonedBatches: this.abandonedBatches,
      inFlightRecords: this.inFlight?.recordCount ?? 0,
    };
  }

  private async run(): Promise<void> {
    while (!this.stopped) {
      const batch = this.drained.shift() ?? this.deps.buffer.takeNext();
      if (!batch) {
        this.currentState = 'idle';
        this.resolveIdle();
        await this.waitForWork();
        continue;
      }
      this.delivering = this.deliver(batch);
      try {
        await this.delivering;
      } finally {
        this.delivering = null;
      }
    }
  }

  private async deliver(batch: Batch): Promise<void> {
    const { sink, monitor, policy } = this.deps;
    const retry: RetryState = { attempt: 1, elapsedMs: 0 };
    let current = batch;
    this.inFlight = current;

    for (;;) {
      if (this.stopped) return;

      if (!monitor.isHealthy(sink.name)) {
        this.currentState = 'paused';
        this.log.info({ batchId: current.id, records: current.recordCount }, 'Sink unhealthy, holding batch until it recovers');

        const recovered = await monitor.whenHealthy(sink.name, this.ac.signal);
        if (!recovered) {
          // Nothing can bring the sink back once probing is cancelled
          this.stop();
          return;
        }
      }

      this.currentState = 'flushing';
      const outcome = await this.flush(current);

      if (outcome.kind !== 'fatal' && outcome.rejected && outcome.rejected.length > 0) {
        for (const record of outcome.rejected) {
          this.deps.divert([record.payload], 'BackendRejected', record.reason);
        }
        this.log.warn({ batchId: current.id, rejected: outcome.rejected.length }, 'Backend rejected records');
      }

      if (outcome.kind === 'success') {
        monitor.recordSuccess(sink.name);
        this.deliveredBatches += 1;
        this.deliveredRecords += current.recordCount - (outcome.rejected?.length ?? 0);
        this.log.debug(
          { batchId: current.id, records: current.recordCount, bytes: current.byteSize, attempts: retry.attempt },
          'Batch delivered',
        );
        this.finish(batch);
        return;
      }

      if (outcome.kind === 'fatal') {
        this.log.error({ batchId: current.id, reason: outcome.reason }, 'Sink refused batch permanently');
        this.abandon(current, `fatal sink failure: ${outcome.reason}`);
        this.finish(batch);
        return;
      }

      monitor.recordFailure(sink.name, outcome.reason);

      if (outcome.pending) {
        const delivered = current.recordCount - outcome.pending.length - (outcome.rejected?.length ?? 0);
        this.deliveredRecords += Math.max(0, delivered);
        if (outcome.pending.length === 0) {
          this.deliveredBatches += 1;
          this.finish(batch);
          return;
        }
        current = narrow(current, outcome.pending);
        this.inFlight = current;
      }

      if (!policy.shouldRetry(retry.attempt, retry.elapsedMs)) {
        this.abandon(
          current,
          `retries exhausted after ${retry.attempt} attempts and ${retry.elapsedMs} ms of backoff: ${outcome.reason}`,
        );
        this.finish(batch);
        return;
      }

      const delayMs = policy.delay(retry.attempt);

      // During an outage the pause at the top of the loop replaces the sleep
      if (monitor.isHealthy(sink.name)) {
        this.currentState = 'backoff';
        this.log.warn(
          { batchId: current.id, attempt: retry.attempt, delayMs, reason: outcome.reason },
          'Flush failed, retrying after backoff',
        );

        const waited = await this.sleep(delayMs, this.ac.signal);
        if (!waited) return;
      }

      retry.elapsedMs += delayMs;
      retry.attempt += 1;
    }
  }

  private async flush(batch: Batch): Promise<FlushOutcome> {
    const attempt = this.attemptFlush(batch);
    this.outstanding = attempt;
    try {
      return await attempt;
    } finally {
      this.outstanding = null;
    }
  }

  private async attemptFlush(batch: Batch): Promise<FlushOutcome> {
    try {
      return await this.deps.sink.flush(batch);
    } catch (err: unknown) {
      return { kind: 'retryable', reason: err instanceof Error ? err.message : String(err) };
    }
  }

  /** Hands a delivered or abandoned batch back to the buffer's accounting. */
  private finish(batch: Batch): void {
    this.inFlight = null;
    this.deps.buffer.complete(batch);
  }

  private abandon(batch: Batch, message: string): void {
    this.currentState = 'abandoned';
    this.abandonedBatches += 1;
    this.log.error(
      { batchId: batch.id, records: batch.recordCount, bytes: batch.byteSize, reason: message },
      'Batch abandoned',
    );
    this.deps.divert(batch.payloads, 'GenericError', message);
  }

  private hasWork(): boolean {
    return this.drained.length > 0 || this.deps.buffer.pendingCount > 0;
  }

  private waitForWork(): Promise<void> {
    if (this.stopped || this.hasWork()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.wake = resolve;
    });
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private resolveIdle(): void {
    for (const resolve of this.idleWaiters) resolve();
    this.idleWaiters.clear();
  }
}

/** Same batch identity, restricted to the payloads that still need a write. */
function narrow(batch: Batch, payloads: readonly Payload[]): Batch {
  return Object.freeze({
    ...batch,
    payloads: Object.freeze([...payloads]),
    byteSize: byteSizeOf(payloads),
    recordCount: payloads.length,
  });
}
