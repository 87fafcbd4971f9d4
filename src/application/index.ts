export { createBackoffPolicy, seededUnit } from './backoff-policy.js';
export type { BackoffConfig, BackoffPolicy } from './backoff-policy.js';
export { EventBuffer } from './event-buffer.js';
export type { EventBufferOptions, EnqueueResult, BufferStats } from './event-buffer.js';
export { checkRecordSize } from './size-guard.js';
export type { SizeCheck } from './size-guard.js';
export { createBadRowFactory, truncatedSummary } from './bad-rows.js';
export type { BadRowFactory, BadRowFactoryOptions } from './bad-rows.js';
export { CollectorPipeline } from './collector-pipeline.js';
export type { SubmitResult, CollectorPipelineDeps } from './collector-pipeline.js';
export { OutageMonitor } from './outage-monitor.js';
export type { SinkHealth, SinkHealthReport, SinkStatus, OutageMonitorOptions } from './outage-monitor.js';
export { DispatchLoop } from './dispatch-loop.js';
export type { DispatchState, DispatchStats, DivertHandler, DispatchLoopDeps } from './dispatch-loop.js';
export { ShutdownCoordinator } from './shutdown-coordinator.js';
export type { ShutdownOptions, ShutdownDeps, ShutdownResult, LossReport } from './shutdown-coordinator.js';
export { Warmup } from './warmup.js';
export type { WarmupOptions, WarmupRequest, WarmupResult } from './warmup.js';
export { createHealthReporter } from './health.js';
export type { HealthReporter, RootStatus, SinkStatusReport, UnavailableReason } from './health.js';
export { trackBodySchema, trackEventSchema, trackQuerySchema } from './track-schema.js';
export { serializeTrackRequest, buildCollectorPayload, flattenHeaders, COLLECTOR_PAYLOAD_SCHEMA } from './collector-payload.js';
export type { TrackRequest, CollectorPayload, CollectorPayloadOptions } from './collector-payload.js';
export { sleep } from './sleep.js';
