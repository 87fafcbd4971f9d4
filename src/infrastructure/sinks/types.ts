import type { Batch, Payload } from '../../domain/index.js';

export type SinkKind = 'stream' | 'queue' | 'topic' | 'stdout';

export interface SinkLimits {
  maxBatchBytes: number;
  maxBatchRecords: number;
  /** Largest single record the backend accepts. */
  maxRecordBytes: number;
}

/** A payload the backend refused permanently. */
export interface RejectedRecord {
  payload: Payload;
  reason: string;
}

/**
 * Result of writing one batch.
 *
 * - `success`: the batch is owned by the backend now; `rejected` lists
 *   individual records it refused for good.
 * - `retryable`: transient condition (throttling, connection loss, target
 *   stream or topic missing). `pending` narrows the retry to the records
 *   that were not written; absent means the whole batch.
 * - `fatal`: the backend will never take this batch as is.
 */
export type FlushOutcome =
  | { kind: 'success'; rejected?: readonly RejectedRecord[] }
  | {
      kind: 'retryable';
      reason: string;
      pending?: readonly Payload[];
      rejected?: readonly RejectedRecord[];
    }
  | { kind: 'fatal'; reason: string };

/**
 * One message-queue backend instance.
 *
 * Variants differ only in how they write and probe; batching, retries and
 * health tracking are shared and driven by configuration.
 */
export interface Sink {
  readonly name: string;
  readonly kind: SinkKind;
  readonly limits: SinkLimits;
  flush(batch: Batch): Promise<FlushOutcome>;
  /** Lightweight existence/reachability check used while the sink is unhealthy. */
  probe(): Promise<boolean>;
}

/** Per-kind limits, sized after the backends each variant stands for. */
export const DEFAULT_SINK_LIMITS: Readonly<Record<SinkKind, SinkLimits>> = {
  stream: { maxBatchBytes: 5_000_000, maxBatchRecords: 500, maxRecordBytes: 1_000_000 },
  queue: { maxBatchBytes: 256_000, maxBatchRecords: 10, maxRecordBytes: 256_000 },
  topic: { maxBatchBytes: 10_000_000, maxBatchRecords: 1_000, maxRecordBytes: 10_000_000 },
  stdout: { maxBatchBytes: 1_000_000, maxBatchRecords: 100, maxRecordBytes: 1_000_000 },
};
