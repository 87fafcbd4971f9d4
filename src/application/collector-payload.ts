import { randomUUID } from 'node:crypto';
import { createPayload } from '../domain/index.js';
import type { Payload } from '../domain/index.js';

export const COLLECTOR_PAYLOAD_SCHEMA = 'collector/payload/1-0-0';

export type HeaderValue = string | string[] | undefined;

/** The parts of an HTTP request a payload is built from. */
export interface TrackRequest {
  method: string;
  path: string;
  /** Raw query string without the leading `?`; null when absent. */
  querystring: string | null;
  /** Parsed JSON body; null for query-string requests. */
  body: unknown;
  ipAddress: string;
  hostname: string;
  headers: Record<string, HeaderValue>;
}

export interface CollectorPayloadOptions {
  /** `<artifact>-<version>` stamped on every payload. */
  collector: string;
  /** Partition by client IP; a random key spreads load instead. */
  ipPartitionKey: boolean;
  /** Lower-case header names never written downstream. */
  redactHeaders: readonly string[];
}

/** Wire format of a good payload, serialized as UTF-8 JSON. */
export interface CollectorPayload {
  schema: typeof COLLECTOR_PAYLOAD_SCHEMA;
  timestamp: string;
  collector: string;
  method: string;
  path: string;
  querystring: string | null;
  body: unknown;
  ipAddress: string;
  hostname: string;
  userAgent: string | null;
  referer: string | null;
  contentType: string | null;
  headers: Record<string, string>;
}

const encoder = new TextEncoder();

function firstValue(value: HeaderValue): string | null {
  if (Array.isArray(value)) return value[0] ?? null;
  return value ?? null;
}

/**
 * Keeps single-valued headers, joins repeated ones with `, ` and drops
 * the redacted set.
 */
export function flattenHeaders(
  headers: Record<string, HeaderValue>,
  redact: readonly string[],
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    if (value === undefined || redact.includes(key)) continue;
    out[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  return out;
}

export function buildCollectorPayload(
  request: TrackRequest,
  options: CollectorPayloadOptions,
  now: Date = new Date(),
): CollectorPayload {
  return {
    schema: COLLECTOR_PAYLOAD_SCHEMA,
    timestamp: now.toISOString(),
    collector: options.collector,
    method: request.method,
    path: request.path,
    querystring: request.querystring,
    body: request.body,
    ipAddress: request.ipAddress,
    hostname: request.hostname,
    userAgent: firstValue(request.headers['user-agent']),
    referer: firstValue(request.headers['referer']),
    contentType: firstValue(request.headers['content-type']),
    headers: flattenHeaders(request.headers, options.redactHeaders),
  };
}

/** Serializes a tracking request into a good payload with its partition key. */
export function serializeTrackRequest(
  request: TrackRequest,
  options: CollectorPayloadOptions,
  now: Date = new Date(),
): Payload {
  const record = buildCollectorPayload(request, options, now);
  const partitionKey = options.ipPartitionKey ? request.ipAddress : randomUUID();
  return createPayload(encoder.encode(JSON.stringify(record)), partitionKey, 'good');
}
