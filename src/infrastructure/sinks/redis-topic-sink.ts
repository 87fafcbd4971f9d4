import type Redis from 'ioredis';
import type { Batch } from '../../domain/index.js';
import type { FlushOutcome, Sink, SinkLimits } from './types.js';
import { describeError, outcomeFromReplies } from './redis-outcome.js';

export interface RedisTopicSinkOptions {
  name: string;
  channel: string;
  limits: SinkLimits;
}

/**
 * Publishes each payload to a Redis Pub/Sub channel.
 *
 * Pub/Sub keeps nothing: a message published while nobody listens is gone.
 * A PUBLISH that reached zero receivers is therefore retried, and the
 * probe only reports the topic as present once a subscriber is attached.
 */
export function createRedisTopicSink(redis: Redis, options: RedisTopicSinkOptions): Sink {
  async function flush(batch: Batch): Promise<FlushOutcome> {
    const pipeline = redis.pipeline();
    for (const payload of batch.payloads) {
      pipeline.publish(options.channel, Buffer.from(payload.bytes));
    }

    try {
      const replies = await pipeline.exec();
      if (replies === null) {
        return { kind: 'retryable', reason: 'pipeline discarded' };
      }
      return outcomeFromReplies(batch.payloads, replies, (result) =>
        result === 0 ? `topic ${options.channel} has no subscribers` : undefined,
      );
    } catch (err: unknown) {
      return { kind: 'retryable', reason: describeError(err) };
    }
  }

  async function probe(): Promise<boolean> {
    // Reply shape: [channel, count]
    const reply = await redis.pubsub('NUMSUB', options.channel);
    return Number(reply[1] ?? 0) > 0;
  }

  return {
    name: options.name,
    kind: 'topic',
    limits: options.limits,
    flush,
    probe,
  };
}
