import type Redis from 'ioredis';
import type { Sink, SinkKind, SinkLimits } from './types.js';
import { createRedisStreamSink } from './redis-stream-sink.js';
import { createRedisQueueSink } from './redis-queue-sink.js';
import { createRedisTopicSink } from './redis-topic-sink.js';
import { createStdoutSink } from './stdout-sink.js';
import type { LineWriter } from './stdout-sink.js';

export interface SinkSpec {
  /** Logical sink name used in logs and health reports (`good`, `bad`). */
  sink: string;
  type: SinkKind;
  /** Stream key, list key or channel, depending on `type`. */
  target: string;
  limits: SinkLimits;
  streamMaxLen: number;
}

export interface SinkClients {
  redis?: Redis | undefined;
  stdout?: LineWriter | undefined;
}

/** Builds the sink variant a destination is configured with. */
export function createSink(spec: SinkSpec, clients: SinkClients): Sink {
  if (spec.type === 'stdout') {
    return createStdoutSink({ name: spec.sink, limits: spec.limits, out: clients.stdout });
  }

  const redis = clients.redis;
  if (!redis) {
    throw new Error(`Sink "${spec.sink}" of type ${spec.type} needs a Redis client`);
  }

  switch (spec.type) {
    case 'stream':
      return createRedisStreamSink(redis, {
        name: spec.sink,
        key: spec.target,
        limits: spec.limits,
        maxLen: spec.streamMaxLen,
      });
    case 'queue':
      return createRedisQueueSink(redis, { name: spec.sink, key: spec.target, limits: spec.limits });
    case 'topic':
      return createRedisTopicSink(redis, { name: spec.sink, channel: spec.target, limits: spec.limits });
  }
}

/** Whether any of the given sink types writes through Redis. */
export function needsRedis(types: readonly SinkKind[]): boolean {
  return types.some((type) => type !== 'stdout');
}
