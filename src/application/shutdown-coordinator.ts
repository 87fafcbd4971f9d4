import type { Logger } from 'pino';
import type { Batch, Destination } from '../domain/index.js';
import type { DispatchLoop } from './dispatch-loop.js';
import { sleep } from './sleep.js';

export interface ShutdownOptions {
  /** Upper bound on the whole drain phase. */
  drainTimeoutMs: number;
  /** Pause between closing ingress and draining, for load balancers to notice. */
  preTerminationMs: number;
  /** How long a flush still outstanding after the drain may take to answer. Defaults to 1000. */
  inFlightGraceMs?: number;
}

const DEFAULT_IN_FLIGHT_GRACE_MS = 1000;

export interface ShutdownDeps {
  /** Closes the ingress gate in the HTTP layer. */
  stopIngress: () => void;
  /** Cancels warmup. */
  cancelWarmup: () => void;
  /** Cancels background probe tasks. */
  stopProbes: () => void;
  /**
   * Dispatch loops in drain order. The good loop comes before the bad one,
   * so batches it abandons still reach the bad buffer.
   */
  loops: readonly DispatchLoop[];
  /** Releases the HTTP server and backend clients. */
  closeResources: () => Promise<void>;
  log: Logger;
  now?: () => number;
}

export interface LossReport {
  destination: Destination;
  batches: number;
  records: number;
  bytes: number;
  batchIds: number[];
}

export type ShutdownResult =
  | { outcome: 'clean'; elapsedMs: number }
  | {
      outcome: 'timeout' | 'incomplete';
      elapsedMs: number;
      lostBatches: number;
      lostRecords: number;
      losses: LossReport[];
      /** Batches whose flush never answered; they may or may not have landed. */
      inFlight: LossReport[];
    };

/**
 * Graceful termination sequence.
 *
 * 1. close ingress
 * 2. cancel warmup
 * 3. drain every loop in order, bounded by `drainTimeoutMs`
 * 4. stop probes and loops, give outstanding flushes a short grace, then
 *    report what is lost and what is still in flight
 * 5. release resources and log the final `Server terminated` line
 *
 * Probes keep running through the drain window: an unhealthy sink can only
 * come back through one. Later signals reuse the first shutdown.
 */
export class ShutdownCoordinator {
  private readonly options: ShutdownOptions;
  private readonly deps: ShutdownDeps;
  private readonly now: () => number;
  private inProgress: Promise<ShutdownResult> | null = null;

  constructor(options: ShutdownOptions, deps: ShutdownDeps) {
    this.options = options;
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  shutdown(signal: string): Promise<ShutdownResult> {
    if (this.inProgress) {
      this.deps.log.warn({ signal }, 'Shutdown already in progress, ignoring signal');
      return this.inProgress;
    }
    this.inProgress = this.run(signal);
    return this.inProgress;
  }

  private async run(signal: string): Promise<ShutdownResult> {
    const { log } = this.deps;
    const startedAt = this.now();

    log.info(
      { signal, drainTimeoutMs: this.options.drainTimeoutMs },
      'Termination signal received, draining buffers',
    );

    this.deps.stopIngress();
    this.deps.cancelWarmup();

    if (this.options.preTerminationMs > 0) {
      await sleep(this.options.preTerminationMs);
    }

    const drained = await this.drainWithin(this.options.drainTimeoutMs);

    this.deps.stopProbes();
    for (const loop of this.deps.loops) loop.stop();
    await this.settleWithin(this.options.inFlightGraceMs ?? DEFAULT_IN_FLIGHT_GRACE_MS);

    const losses: LossReport[] = [];
    const inFlight: LossReport[] = [];
    for (const loop of this.deps.loops) {
      const left = loop.undelivered();
      if (left.length > 0) losses.push(lossReport(loop.destination, left));
      const outstanding = loop.outstandingBatch();
      if (outstanding) inFlight.push(lossReport(loop.destination, [outstanding]));
    }

    for (const loss of losses) {
      log.error(loss, 'Undelivered batches lost at shutdown');
    }
    for (const unknown of inFlight) {
      log.warn(unknown, 'Batch still in flight at shutdown, delivery outcome unknown');
    }

    try {
      await this.deps.closeResources();
    } catch (err: unknown) {
      log.error({ err }, 'Failed to release resources during shutdown');
    }

    const elapsedMs = this.now() - startedAt;

    if (losses.length === 0 && inFlight.length === 0) {
      log.info({ outcome: 'clean', elapsedMs }, 'Server terminated');
      return { outcome: 'clean', elapsedMs };
    }

    const lostBatches = losses.reduce((n, l) => n + l.batches, 0);
    const lostRecords = losses.reduce((n, l) => n + l.records, 0);
    const inFlightRecords = inFlight.reduce((n, l) => n + l.records, 0);
    const outcome = drained ? 'incomplete' : 'timeout';
    log.error({ outcome, elapsedMs, lostBatches, lostRecords, inFlightRecords }, 'Server terminated');
    return { outcome, elapsedMs, lostBatches, lostRecords, losses, inFlight };
  }

  /** Waits for stopped loops to finish their current attempt, at most `graceMs`. */
  private async settleWithin(graceMs: number): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, graceMs);
    });

    try {
      await Promise.race([Promise.all(this.deps.loops.map((loop) => loop.settled())), grace]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Drains loops one after another; `false` when the deadline hit first. */
  private async drainWithin(timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    const work = (async (): Promise<true> => {
      for (const loop of this.deps.loops) {
        await loop.drain();
      }
      return true;
    })();

    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function lossReport(destination: Destination, batches: readonly Batch[]): LossReport {
  return {
    destination,
    batches: batches.length,
    records: batches.reduce((n, b) => n + b.recordCount, 0),
    bytes: batches.reduce((n, b) => n + b.byteSize, 0),
    batchIds: batches.map((b) => b.id),
  };
}
