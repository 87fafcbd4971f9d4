import fp from 'fastify-plugin';
import Redis from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  url: string;
  /** Per-command timeout; a stalled backend surfaces as a retryable flush failure. */
  commandTimeoutMs: number;
}

/**
 * Fastify plugin that manages the ioredis connection lifecycle.
 *
 * - Connects on server start, disconnects on close.
 * - Decorates `fastify.redis` for the sinks.
 *
 * An unreachable server does not fail startup: the client keeps
 * reconnecting in the background and the sinks start out unhealthy.
 */
async function redisPlugin(fastify: FastifyInstance, options: RedisPluginOptions): Promise<void> {
  const redis = new Redis(options.url, {
    maxRetriesPerRequest: 1,      // fail fast; retries are the dispatch loop's job
    commandTimeout: options.commandTimeoutMs,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  redis.on('error', (err: Error) => {
    fastify.log.debug({ err: err.message }, 'Redis connection error');
  });

  try {
    await redis.connect();
    fastify.log.info('Redis connected');
  } catch (err: unknown) {
    fastify.log.warn({ err }, 'Redis not reachable at startup, reconnecting in background');
  }

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    try {
      await redis.quit();
    } catch {
      // quit() rejects when the connection never came up
      redis.disconnect();
    }
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.redis` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
