import type { EventBuffer, BufferStats } from './event-buffer.js';
import type { OutageMonitor, SinkHealthReport } from './outage-monitor.js';

export type RootStatus = 'ready' | 'warming';

export type UnavailableReason = 'sink_unhealthy' | 'buffer_overflow';

export interface SinkStatusReport {
  status: 'ok' | 'unavailable';
  reasons: UnavailableReason[];
  overflow: boolean;
  sinks: SinkHealthReport[];
  buffers: BufferStats[];
}

export interface HealthReporter {
  rootStatus(): RootStatus;
  sinkStatus(): SinkStatusReport;
}

export interface HealthReporterDeps {
  readiness: { isReady(): boolean };
  monitor: OutageMonitor;
  buffers: readonly EventBuffer[];
}

/**
 * Aggregates readiness for the `/health` and `/sink-health` routes.
 *
 * Root status depends on warmup only; sink status on the outage monitor and
 * the buffers' memory ceiling. Reading either never touches the network.
 */
export function createHealthReporter(deps: HealthReporterDeps): HealthReporter {
  return {
    rootStatus(): RootStatus {
      return deps.readiness.isReady() ? 'ready' : 'warming';
    },

    sinkStatus(): SinkStatusReport {
      const sinks = deps.monitor.snapshot();
      const buffers = deps.buffers.map((buffer) => buffer.stats());
      const overflow = buffers.some((b) => b.overflow);

      const reasons: UnavailableReason[] = [];
      if (sinks.some((s) => s.status !== 'healthy')) reasons.push('sink_unhealthy');
      if (overflow) reasons.push('buffer_overflow');

      return {
        status: reasons.length === 0 ? 'ok' : 'unavailable',
        reasons,
        overflow,
        sinks,
        buffers,
      };
    },
  };
}
