export { redisPlugin } from './redis/index.js';
export type { RedisPluginOptions } from './redis/index.js';
export { loadConfig, parseConfig, ConfigError } from './config/index.js';
export type { CollectorConfig, SinkConfig } from './config/index.js';
export { createSink, needsRedis, DEFAULT_SINK_LIMITS } from './sinks/index.js';
export type { Sink, SinkKind, SinkLimits, FlushOutcome, SinkSpec, SinkClients } from './sinks/index.js';
