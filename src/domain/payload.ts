/**
 * Core domain types for the collector's buffering pipeline.
 *
 * These types define the shape of a payload as it moves from the HTTP
 * layer through the buffers into a sink. They carry no framework dependencies.
 */

/** Logical output a payload is routed to. */
export type Destination = 'good' | 'bad';

/**
 * Serialized record ready for a sink.
 *
 * Immutable once created. The buffer owns it until a sink accepts the
 * batch containing it.
 */
export interface Payload {
  readonly bytes: Uint8Array;
  readonly partitionKey: string;
  readonly destination: Destination;
}

/**
 * Sealed, ordered group of payloads written to a sink as one unit.
 *
 * `byteSize` and `recordCount` never exceed the limits of the buffer
 * that sealed it.
 */
export interface Batch {
  readonly id: number;
  readonly destination: Destination;
  readonly payloads: readonly Payload[];
  readonly byteSize: number;
  readonly recordCount: number;
  readonly openedAt: number;
  readonly sealedAt: number;
}

export function createPayload(
  bytes: Uint8Array,
  partitionKey: string,
  destination: Destination,
): Payload {
  return Object.freeze({ bytes, partitionKey, destination });
}

/** Total byte size of a list of payloads. */
export function byteSizeOf(payloads: readonly Payload[]): number {
  let total = 0;
  for (const payload of payloads) total += payload.bytes.byteLength;
  return total;
}
