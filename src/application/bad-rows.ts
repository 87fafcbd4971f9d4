import { createPayload, BAD_ROW_SCHEMA } from '../domain/index.js';
import type { BadRow, BadRowFailure, BadRowPayload, BadRowReason, Payload } from '../domain/index.js';

export interface BadRowFactoryOptions {
  artifact: string;
  version: string;
  /** Per-record maximum of the bad sink; every row is kept under it. */
  maxRecordBytes: number;
  now?: () => Date;
}

export interface BadRowFactory {
  sizeViolation(payload: Payload, maximumAllowedSizeBytes: number): Payload;
  create(reason: BadRowReason, payload: Payload, message: string): Payload;
}

const encoder = new TextEncoder();

/** First `maxBytes` bytes of a payload decoded as UTF-8. */
export function truncatedSummary(bytes: Uint8Array, maxBytes: number): string {
  return Buffer.from(bytes.subarray(0, Math.max(0, maxBytes))).toString('utf8');
}

/**
 * Builds serialized bad rows addressed to the bad destination.
 *
 * Size violations always carry a readable summary of one tenth of the
 * allowed size. Other reasons embed the full payload as base64 when the row
 * still fits the bad sink, and fall back to the summary when it does not.
 */
export function createBadRowFactory(options: BadRowFactoryOptions): BadRowFactory {
  const now = options.now ?? (() => new Date());
  const summaryBytes = Math.floor(options.maxRecordBytes / 10);

  function encode(row: BadRow, original: Payload): Payload {
    return createPayload(encoder.encode(JSON.stringify(row)), original.partitionKey, 'bad');
  }

  function build(reason: BadRowReason, failure: BadRowFailure, payload: BadRowPayload): BadRow {
    return {
      schema: BAD_ROW_SCHEMA,
      reason,
      failure,
      payload,
      processor: { artifact: options.artifact, version: options.version },
    };
  }

  function summaryOf(original: Payload, maxBytes: number): BadRowPayload {
    return {
      partitionKey: original.partitionKey,
      encoding: 'utf8-truncated',
      data: truncatedSummary(original.bytes, maxBytes),
    };
  }

  function fitted(reason: BadRowReason, failure: BadRowFailure, original: Payload): Payload {
    const full = encode(
      build(reason, failure, {
        partitionKey: original.partitionKey,
        encoding: 'base64',
        data: Buffer.from(original.bytes).toString('base64'),
      }),
      original,
    );
    if (full.bytes.byteLength <= options.maxRecordBytes) return full;

    const summarized = encode(build(reason, failure, summaryOf(original, summaryBytes)), original);
    if (summarized.bytes.byteLength <= options.maxRecordBytes) return summarized;

    return encode(build(reason, failure, summaryOf(original, 0)), original);
  }

  function sizeViolation(payload: Payload, maximumAllowedSizeBytes: number): Payload {
    const actualSizeBytes = payload.bytes.byteLength;
    const failure: BadRowFailure = {
      timestamp: now().toISOString(),
      message: `Payload with size ${actualSizeBytes} bytes exceeds maximum allowed size of ${maximumAllowedSizeBytes} bytes`,
      actualSizeBytes,
      maximumAllowedSizeBytes,
    };
    const row = build('SizeViolation', failure, summaryOf(payload, Math.floor(maximumAllowedSizeBytes / 10)));
    const encoded = encode(row, payload);
    if (encoded.bytes.byteLength <= options.maxRecordBytes) return encoded;
    return encode(build('SizeViolation', failure, summaryOf(payload, 0)), payload);
  }

  function create(reason: BadRowReason, payload: Payload, message: string): Payload {
    if (reason === 'SizeViolation') return sizeViolation(payload, options.maxRecordBytes);
    return fitted(reason, { timestamp: now().toISOString(), message }, payload);
  }

  return {
    sizeViolation,
    create,
  };
}
