import type Redis from 'ioredis';
import type { Batch } from '../../domain/index.js';
import type { FlushOutcome, Sink, SinkLimits } from './types.js';
import { describeError, outcomeFromReplies } from './redis-outcome.js';

export interface RedisStreamSinkOptions {
  name: string;
  /** Stream key. It must already exist: the collector never creates it. */
  key: string;
  limits: SinkLimits;
  /** Approximate MAXLEN trim applied on every XADD; 0 disables trimming. */
  maxLen: number;
}

/**
 * Writes each payload as one Redis Stream entry.
 *
 * Entries use auto-generated IDs (`*`) and carry two fields: `pk` (the
 * partition key) and `data` (the raw payload bytes). `NOMKSTREAM` makes a
 * missing stream visible as a nil reply instead of silently creating it,
 * which the outage monitor then treats as a backend that is not there yet.
 */
export function createRedisStreamSink(redis: Redis, options: RedisStreamSinkOptions): Sink {
  const trim: (string | number)[] = options.maxLen > 0 ? ['MAXLEN', '~', options.maxLen] : [];

  async function flush(batch: Batch): Promise<FlushOutcome> {
    const pipeline = redis.pipeline();
    for (const payload of batch.payloads) {
      const args: (string | number | Buffer)[] = [
        'NOMKSTREAM',
        ...trim,
        '*',
        'pk', payload.partitionKey,
        'data', Buffer.from(payload.bytes),
      ];
      pipeline.xadd(options.key, ...args);
    }

    try {
      const replies = await pipeline.exec();
      if (replies === null) {
        return { kind: 'retryable', reason: 'pipeline discarded' };
      }
      return outcomeFromReplies(batch.payloads, replies, (result) =>
        result === null ? `stream ${options.key} does not exist` : undefined,
      );
    } catch (err: unknown) {
      return { kind: 'retryable', reason: describeError(err) };
    }
  }

  async function probe(): Promise<boolean> {
    return (await redis.exists(options.key)) === 1;
  }

  return {
    name: options.name,
    kind: 'stream',
    limits: options.limits,
    flush,
    probe,
  };
}
