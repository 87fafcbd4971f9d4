export type { Sink, SinkKind, SinkLimits, FlushOutcome, RejectedRecord } from './types.js';
export { DEFAULT_SINK_LIMITS } from './types.js';
export { createSink, needsRedis } from './create-sink.js';
export type { SinkSpec, SinkClients } from './create-sink.js';
export { createRedisStreamSink } from './redis-stream-sink.js';
export type { RedisStreamSinkOptions } from './redis-stream-sink.js';
export { createRedisQueueSink } from './redis-queue-sink.js';
export type { RedisQueueSinkOptions } from './redis-queue-sink.js';
export { createRedisTopicSink } from './redis-topic-sink.js';
export type { RedisTopicSinkOptions } from './redis-topic-sink.js';
export { createStdoutSink } from './stdout-sink.js';
export type { StdoutSinkOptions, LineWriter } from './stdout-sink.js';
export { isTransientRedisError, outcomeFromReplies } from './redis-outcome.js';
export type { PipelineReply } from './redis-outcome.js';
