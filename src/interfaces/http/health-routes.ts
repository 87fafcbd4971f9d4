import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { HealthReporter } from '../../application/index.js';

export interface HealthRoutesOptions {
  health: HealthReporter;
}

/**
 * GET /health      — 200 `OK` once warmup finished, 503 while warming
 * GET /sink-health — 200 `OK` when every sink is healthy and no buffer
 *                    overflowed, 503 with the report otherwise
 */
async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions): Promise<void> {
  const { health } = options;

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    if (health.rootStatus() === 'ready') {
      return reply.status(200).type('text/plain').send('OK');
    }
    return reply.status(503).type('text/plain').send('Warming up');
  });

  fastify.get('/sink-health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const report = health.sinkStatus();
    if (report.status === 'ok') {
      return reply.status(200).type('text/plain').send('OK');
    }
    return reply.status(503).send(report);
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
