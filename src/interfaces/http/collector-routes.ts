import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  serializeTrackRequest,
  trackBodySchema,
  trackQuerySchema,
} from '../../application/index.js';
import type {
  CollectorPayloadOptions,
  CollectorPipeline,
  SubmitResult,
  TrackRequest,
} from '../../application/index.js';

/** Header that marks a synthetic warmup request. */
export const WARMUP_HEADER = 'x-collector-warmup';

export interface CollectorRoutesOptions {
  pipeline: CollectorPipeline;
  payload: CollectorPayloadOptions;
}

function splitUrl(url: string): { path: string; querystring: string | null } {
  const idx = url.indexOf('?');
  if (idx === -1) return { path: url, querystring: null };
  const querystring = url.slice(idx + 1);
  return { path: url.slice(0, idx), querystring: querystring === '' ? null : querystring };
}

function toTrackRequest(request: FastifyRequest, body: unknown): TrackRequest {
  const { path, querystring } = splitUrl(request.url);
  return {
    method: request.method,
    path,
    querystring,
    body,
    ipAddress: request.ip,
    hostname: request.hostname,
    headers: request.headers,
  };
}

function sendResult(reply: FastifyReply, result: SubmitResult): FastifyReply {
  if (result.status === 'rejected') {
    return reply.status(503).send({ error: 'Service Unavailable', reason: result.reason });
  }
  // Oversized payloads are already captured as bad rows; the tracker must not resend them
  return reply.status(202).send({ status: 'accepted' });
}

/**
 * Registers the tracking routes.
 *
 * POST /api/v1/track — JSON body, one event or a batch
 * GET  /api/v1/track — query-string tracking (pixel requests)
 *
 * Each request becomes one payload. Requests carrying the warmup header go
 * through parsing, serialization and the size guard but are never buffered.
 */
async function collectorRoutes(fastify: FastifyInstance, options: CollectorRoutesOptions): Promise<void> {
  const { pipeline } = options;

  const handle = (request: FastifyRequest, reply: FastifyReply, body: unknown): FastifyReply => {
    const payload = serializeTrackRequest(toTrackRequest(request, body), options.payload);

    if (request.headers[WARMUP_HEADER] !== undefined) {
      return sendResult(reply, pipeline.rehearse(payload));
    }
    return sendResult(reply, pipeline.submit(payload));
  };

  fastify.post(
    '/api/v1/track',
    async (request: FastifyRequest, reply: FastifyReply) => {
      if (!pipeline.acceptingIngress) {
        return reply.status(503).send({ error: 'Service Unavailable', reason: 'ingress_stopped' });
      }

      const parsed = trackBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      return handle(request, reply, parsed.data);
    },
  );

  fastify.get(
    '/api/v1/track',
    async (request: FastifyRequest, reply: FastifyReply) => {
      if (!pipeline.acceptingIngress) {
        return reply.status(503).send({ error: 'Service Unavailable', reason: 'ingress_stopped' });
      }

      const parsed = trackQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      return handle(request, reply, null);
    },
  );
}

export default fp(collectorRoutes, {
  name: 'collector-routes',
  fastify: '5.x',
});
