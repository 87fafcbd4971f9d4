export type { Destination, Payload, Batch } from './payload.js';
export { createPayload, byteSizeOf } from './payload.js';
export type { BadRow, BadRowReason, BadRowFailure, BadRowPayload } from './bad-row.js';
export { BAD_ROW_SCHEMA } from './bad-row.js';
