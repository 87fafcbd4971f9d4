import type { Logger } from 'pino';
import type { BadRowReason, Payload } from '../domain/index.js';
import type { EventBuffer } from './event-buffer.js';
import type { BadRowFactory } from './bad-rows.js';
import { checkRecordSize } from './size-guard.js';
import type { SizeCheck } from './size-guard.js';

export type SubmitResult =
  | { status: 'accepted' }
  | { status: 'size_violation'; actualSizeBytes: number; maximumAllowedSizeBytes: number }
  | { status: 'rejected'; reason: 'overflow' | 'oversized' | 'ingress_stopped' };

export interface CollectorPipelineDeps {
  good: EventBuffer;
  bad: EventBuffer;
  /** Per-record maximum of the good sink. */
  maxRecordBytes: number;
  badRows: BadRowFactory;
  log: Logger;
}

/**
 * Ingestion entry point used by the HTTP layer.
 *
 * Applies the size guard, routes payloads to the good buffer and bad rows to
 * the bad buffer, and owns the ingress gate the shutdown sequence closes.
 */
export class CollectorPipeline {
  private readonly deps: CollectorPipelineDeps;
  private accepting = true;

  constructor(deps: CollectorPipelineDeps) {
    this.deps = deps;
  }

  get acceptingIngress(): boolean {
    return this.accepting;
  }

  stopIngress(): void {
    if (!this.accepting) return;
    this.accepting = false;
    this.deps.log.info('Ingress stopped, new tracking requests are refused');
  }

  submit(payload: Payload): SubmitResult {
    if (!this.accepting) return { status: 'rejected', reason: 'ingress_stopped' };

    const check = checkRecordSize(payload, this.deps.maxRecordBytes);
    if (!check.ok) {
      const row = this.deps.badRows.sizeViolation(payload, check.maximumAllowedSizeBytes);
      this.deps.log.warn(
        { partitionKey: payload.partitionKey, actualSizeBytes: check.actualSizeBytes, maximumAllowedSizeBytes: check.maximumAllowedSizeBytes },
        'Payload exceeds maximum record size, routed to bad output',
      );
      const result = this.deps.bad.enqueue(row);
      if (!result.accepted) {
        this.deps.log.error({ reason: result.reason }, 'Size violation bad row could not be buffered');
        return { status: 'rejected', reason: result.reason };
      }
      return sizeViolation(check);
    }

    const result = this.deps.good.enqueue(payload);
    if (!result.accepted) return { status: 'rejected', reason: result.reason };
    return { status: 'accepted' };
  }

  /**
   * Answers as `submit` would without buffering anything: size guard, then
   * the good buffer's capacity. Used for warmup requests.
   */
  rehearse(payload: Payload): SubmitResult {
    if (!this.accepting) return { status: 'rejected', reason: 'ingress_stopped' };
    const check = checkRecordSize(payload, this.deps.maxRecordBytes);
    if (!check.ok) return sizeViolation(check);

    const capacity = this.deps.good.checkCapacity(payload.bytes.byteLength);
    if (!capacity.accepted) return { status: 'rejected', reason: capacity.reason };
    return { status: 'accepted' };
  }

  /**
   * Rewrites undeliverable good payloads as bad rows and buffers them.
   *
   * Used by the good dispatch loop on abandonment and per-record rejection.
   * Bad rows that cannot be buffered are lost; that is logged, never retried.
   */
  divertToBad(payloads: readonly Payload[], reason: BadRowReason, message: string): void {
    let lost = 0;
    for (const payload of payloads) {
      const row = this.deps.badRows.create(reason, payload, message);
      if (!this.deps.bad.enqueue(row).accepted) lost++;
    }

    if (lost > 0) {
      this.deps.log.error({ reason, lost, total: payloads.length }, 'Bad rows dropped: bad buffer refused them');
    }
  }
}

function sizeViolation(check: Extract<SizeCheck, { ok: false }>): SubmitResult {
  return {
    status: 'size_violation',
    actualSizeBytes: check.actualSizeBytes,
    maximumAllowedSizeBytes: check.maximumAllowedSizeBytes,
  };
}
