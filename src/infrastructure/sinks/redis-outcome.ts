import type { Payload } from '../../domain/index.js';
import type { FlushOutcome, RejectedRecord } from './types.js';

/** Reply prefixes Redis uses for conditions that clear up on their own. */
const TRANSIENT_PREFIXES = [
  'LOADING',
  'BUSY',
  'TRYAGAIN',
  'CLUSTERDOWN',
  'MASTERDOWN',
  'READONLY',
  'OOM',
];

/** Client-side failures ioredis raises while the connection is unusable. */
const TRANSIENT_MESSAGES = [
  'Connection is closed',
  'Command timed out',
  'Stream isn\'t writeable',
];

/**
 * Decides whether a Redis error is worth retrying.
 *
 * Anything else (WRONGTYPE, ERR syntax, …) will fail again with the same
 * input and is treated as a permanent rejection.
 */
export function isTransientRedisError(err: unknown): boolean {
  if (!(err instanceof Error)) return true;
  if (err.name === 'MaxRetriesPerRequestError') return true;
  if (TRANSIENT_PREFIXES.some((prefix) => err.message.startsWith(prefix))) return true;
  return TRANSIENT_MESSAGES.some((msg) => err.message.includes(msg));
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Per-command pipeline reply as returned by ioredis `exec()`. */
export type PipelineReply = [error: Error | null, result: unknown];

/**
 * Folds per-command pipeline replies into one flush outcome.
 *
 * Commands are issued one per payload, in order. `missingTarget` inspects a
 * successful reply and returns a reason when the write did not land (e.g.
 * XADD NOMKSTREAM on a missing stream) so the record is retried.
 */
export function outcomeFromReplies(
  payloads: readonly Payload[],
  replies: readonly PipelineReply[],
  missingTarget: (result: unknown) => string | undefined,
): FlushOutcome {
  const pending: Payload[] = [];
  const rejected: RejectedRecord[] = [];
  let reason = '';

  payloads.forEach((payload, i) => {
    const reply = replies[i];
    if (!reply) {
      pending.push(payload);
      reason = 'missing pipeline reply';
      return;
    }

    const [err, result] = reply;
    if (err) {
      if (isTransientRedisError(err)) {
        pending.push(payload);
        reason = err.message;
      } else {
        rejected.push({ payload, reason: err.message });
      }
      return;
    }

    const missing = missingTarget(result);
    if (missing !== undefined) {
      pending.push(payload);
      reason = missing;
    }
  });

  if (pending.length > 0) {
    return {
      kind: 'retryable',
      reason,
      pending,
      ...(rejected.length > 0 ? { rejected } : {}),
    };
  }

  return { kind: 'success', ...(rejected.length > 0 ? { rejected } : {}) };
}
