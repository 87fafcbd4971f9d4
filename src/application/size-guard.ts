import type { Payload } from '../domain/index.js';

export type SizeCheck =
  | { ok: true }
  | { ok: false; actualSizeBytes: number; maximumAllowedSizeBytes: number };

/**
 * Compares one payload with the sink's per-record maximum.
 *
 * Runs before the payload reaches a buffer: a single oversized record must
 * never hold up an otherwise healthy batch.
 */
export function checkRecordSize(payload: Payload, maxRecordBytes: number): SizeCheck {
  const actualSizeBytes = payload.bytes.byteLength;
  if (actualSizeBytes <= maxRecordBytes) return { ok: true };
  return { ok: false, actualSizeBytes, maximumAllowedSizeBytes: maxRecordBytes };
}
