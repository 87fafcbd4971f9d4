import type Redis from 'ioredis';
import type { Batch } from '../../domain/index.js';
import type { FlushOutcome, Sink, SinkLimits } from './types.js';
import { describeError, isTransientRedisError } from './redis-outcome.js';

export interface RedisQueueSinkOptions {
  name: string;
  /** List key consumers pop from. */
  key: string;
  limits: SinkLimits;
}

/**
 * Pushes a whole batch onto a Redis list with a single RPUSH.
 *
 * The command is atomic, so a batch either lands completely or not at all.
 * Queue-style backends take small batches; the limits for this kind
 * default accordingly.
 */
export function createRedisQueueSink(redis: Redis, options: RedisQueueSinkOptions): Sink {
  async function flush(batch: Batch): Promise<FlushOutcome> {
    if (batch.payloads.length === 0) return { kind: 'success' };

    const values = batch.payloads.map((payload) => Buffer.from(payload.bytes));

    try {
      await redis.rpush(options.key, ...values);
      return { kind: 'success' };
    } catch (err: unknown) {
      if (isTransientRedisError(err)) {
        return { kind: 'retryable', reason: describeError(err) };
      }
      return { kind: 'fatal', reason: describeError(err) };
    }
  }

  async function probe(): Promise<boolean> {
    return (await redis.ping()) === 'PONG';
  }

  return {
    name: options.name,
    kind: 'queue',
    limits: options.limits,
    flush,
    probe,
  };
}
