/**
 * Diagnostic record for a payload that could not be delivered.
 *
 * Bad rows are serialized as JSON and written to the bad destination.
 */

export type BadRowReason = 'SizeViolation' | 'GenericError' | 'BackendRejected';

export const BAD_ROW_SCHEMA = 'collector/bad_row/1-0-0';

export interface BadRowFailure {
  readonly timestamp: string; // ISO-8601
  readonly message: string;
  readonly actualSizeBytes?: number;
  readonly maximumAllowedSizeBytes?: number;
}

export interface BadRowPayload {
  readonly partitionKey: string;
  /** `base64` carries the full original bytes; `utf8-truncated` a readable prefix. */
  readonly encoding: 'base64' | 'utf8-truncated';
  readonly data: string;
}

export interface BadRow {
  readonly schema: typeof BAD_ROW_SCHEMA;
  readonly reason: BadRowReason;
  readonly failure: BadRowFailure;
  readonly payload: BadRowPayload;
  readonly processor: { readonly artifact: string; readonly version: string };
}
