import type { Logger } from 'pino';
import type { Sink, SinkKind } from '../infrastructure/sinks/types.js';

export type SinkStatus = 'healthy' | 'unhealthy';

export interface SinkHealth {
  status: SinkStatus;
  consecutiveFailures: number;
  /** Epoch ms of the last flush outcome or probe; null before the first one. */
  lastCheckedAt: number | null;
  lastFailureReason: string | null;
}

export interface SinkHealthReport extends SinkHealth {
  sink: string;
  kind: SinkKind;
}

export interface OutageMonitorOptions {
  /** Consecutive retryable failures that flip a sink to unhealthy. */
  unhealthyThreshold: number;
  /** Fixed delay between liveness probes while unhealthy. */
  probeIntervalMs: number;
}

interface Entry {
  sink: Sink;
  health: SinkHealth;
  probeTimer: ReturnType<typeof setInterval> | null;
  probing: boolean;
  waiters: Set<(recovered: boolean) => void>;
}

/**
 * Tracks reachability of every sink and probes the ones that are down.
 *
 * Status changes only here. An unhealthy sink stays unhealthy until one of
 * its probes succeeds; a successful flush in between only resets the
 * failure counter. Probes run on a fixed interval for as long as the
 * outage lasts, with no backoff of their own.
 *
 * All updates are synchronous on the event loop, so concurrent failure
 * reports and probe results cannot lose a counter increment.
 */
export class OutageMonitor {
  private readonly entries = new Map<string, Entry>();
  private readonly options: OutageMonitorOptions;
  private readonly log: Logger;
  private readonly now: () => number;
  private stopped = false;

  constructor(
    sinks: readonly Sink[],
    options: OutageMonitorOptions,
    log: Logger,
    now: () => number = Date.now,
  ) {
    this.options = options;
    this.log = log;
    this.now = now;

    for (const sink of sinks) {
      this.entries.set(sink.name, {
        sink,
        health: { status: 'healthy', consecutiveFailures: 0, lastCheckedAt: null, lastFailureReason: null },
        probeTimer: null,
        probing: false,
        waiters: new Set(),
      });
    }
  }

  isHealthy(sink: string): boolean {
    return this.entry(sink).health.status === 'healthy';
  }

  health(sink: string): SinkHealth {
    return { ...this.entry(sink).health };
  }

  snapshot(): SinkHealthReport[] {
    return [...this.entries.values()].map((entry) => ({
      sink: entry.sink.name,
      kind: entry.sink.kind,
      ...entry.health,
    }));
  }

  recordFailure(sink: string, reason: string): void {
    const entry = this.entry(sink);
    entry.health.consecutiveFailures += 1;
    entry.health.lastCheckedAt = this.now();
    entry.health.lastFailureReason = reason;

    if (
      entry.health.status === 'healthy'
      && entry.health.consecutiveFailures >= this.options.unhealthyThreshold
    ) {
      this.markUnhealthy(entry, reason);
    }
  }

  recordSuccess(sink: string): void {
    const entry = this.entry(sink);
    entry.health.consecutiveFailures = 0;
    entry.health.lastCheckedAt = this.now();
  }

  /**
   * Resolves `true` once the sink is healthy (immediately if it already is),
   * or `false` if waiting was cancelled by `signal` or `stop()`.
   */
  whenHealthy(sink: string, signal?: AbortSignal): Promise<boolean> {
    const entry = this.entry(sink);
    if (entry.health.status === 'healthy') return Promise.resolve(true);
    if (this.stopped || signal?.aborted) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const onAbort = (): void => {
        entry.waiters.delete(settle);
        resolve(false);
      };
      const settle = (recovered: boolean): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve(recovered);
      };
      entry.waiters.add(settle);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Probes every sink once. Sinks whose target is missing or unreachable
   * start out unhealthy and enter the probe loop.
   */
  async checkAtStartup(): Promise<void> {
    await Promise.all(
      [...this.entries.values()].map(async (entry) => {
        const ok = await this.safeProbe(entry);
        entry.health.lastCheckedAt = this.now();
        if (!ok) this.markUnhealthy(entry, 'startup check failed');
      }),
    );
  }

  /** Cancels every probe task and releases pending waiters. */
  stop(): void {
    this.stopped = true;
    for (const entry of this.entries.values()) {
      this.clearProbe(entry);
      for (const waiter of entry.waiters) waiter(false);
      entry.waiters.clear();
    }
  }

  private entry(sink: string): Entry {
    const entry = this.entries.get(sink);
    if (!entry) throw new Error(`Unknown sink: ${sink}`);
    return entry;
  }

  private markUnhealthy(entry: Entry, reason: string): void {
    if (entry.health.status === 'unhealthy') return;
    entry.health.status = 'unhealthy';
    this.log.warn(
      {
        sink: entry.sink.name,
        kind: entry.sink.kind,
        consecutiveFailures: entry.health.consecutiveFailures,
        reason,
      },
      'Sink marked unhealthy',
    );
    this.startProbe(entry);
  }

  private startProbe(entry: Entry): void {
    if (this.stopped || entry.probeTimer) return;

    entry.probeTimer = setInterval(() => {
      void this.runProbe(entry);
    }, this.options.probeIntervalMs);
    entry.probeTimer.unref();
  }

  private clearProbe(entry: Entry): void {
    if (entry.probeTimer) {
      clearInterval(entry.probeTimer);
      entry.probeTimer = null;
    }
  }

  private async runProbe(entry: Entry): Promise<void> {
    // A slow probe must not overlap with the next tick
    if (entry.probing || this.stopped) return;
    entry.probing = true;

    try {
      const ok = await this.safeProbe(entry);
      entry.health.lastCheckedAt = this.now();
      if (!ok || this.stopped || entry.health.status === 'healthy') return;

      entry.health.status = 'healthy';
      entry.health.consecutiveFailures = 0;
      entry.health.lastFailureReason = null;
      this.clearProbe(entry);

      this.log.info({ sink: entry.sink.name, kind: entry.sink.kind }, 'Sink recovered');

      for (const waiter of entry.waiters) waiter(true);
      entry.waiters.clear();
    } finally {
      entry.probing = false;
    }
  }

  private async safeProbe(entry: Entry): Promise<boolean> {
    try {
      return await entry.sink.probe();
    } catch (err: unknown) {
      this.log.debug({ err, sink: entry.sink.name }, 'Sink probe failed');
      return false;
    }
  }
}
