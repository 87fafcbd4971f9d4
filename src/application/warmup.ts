import type { Logger } from 'pino';
import { sleep } from './sleep.js';

export interface WarmupOptions {
  enabled: boolean;
  maxAttempts: number;
  intervalMs: number;
}

/** One synthetic round trip; resolves `true` when the request was accepted. */
export type WarmupRequest = (attempt: number) => Promise<boolean>;

export type WarmupResult =
  | { status: 'succeeded'; attempts: number }
  | { status: 'exhausted'; attempts: number }
  | { status: 'cancelled'; attempts: number }
  | { status: 'disabled' };

/**
 * Startup readiness gate.
 *
 * Sends synthetic requests to the collector's own tracking endpoint until
 * one round trip succeeds or the attempts run out. The service reports
 * itself ready afterwards either way; running out is logged as a warning.
 * `cancel()` (termination) leaves it warming.
 */
export class Warmup {
  private readonly options: WarmupOptions;
  private readonly log: Logger;
  private readonly ac = new AbortController();
  private ready: boolean;

  constructor(options: WarmupOptions, log: Logger) {
    this.options = options;
    this.log = log;
    this.ready = !options.enabled;
  }

  isReady(): boolean {
    return this.ready;
  }

  cancel(): void {
    this.ac.abort();
  }

  async run(request: WarmupRequest): Promise<WarmupResult> {
    if (!this.options.enabled) return { status: 'disabled' };

    let attempts = 0;
    while (attempts < this.options.maxAttempts) {
      if (this.ac.signal.aborted) return this.cancelled(attempts);
      attempts++;

      let ok = false;
      try {
        ok = await request(attempts);
      } catch (err: unknown) {
        this.log.debug({ err, attempt: attempts }, 'Warmup request failed');
      }

      if (this.ac.signal.aborted) return this.cancelled(attempts);

      if (ok) {
        this.ready = true;
        this.log.info({ attempts }, 'Warmup complete, collector is ready');
        return { status: 'succeeded', attempts };
      }

      if (attempts < this.options.maxAttempts) {
        const waited = await sleep(this.options.intervalMs, this.ac.signal);
        if (!waited) return this.cancelled(attempts);
      }
    }

    this.ready = true;
    this.log.warn({ attempts }, 'Warmup attempts exhausted without a successful round trip, marking ready');
    return { status: 'exhausted', attempts };
  }

  private cancelled(attempts: number): WarmupResult {
    this.log.info({ attempts }, 'Warmup cancelled');
    return { status: 'cancelled', attempts };
  }
}
