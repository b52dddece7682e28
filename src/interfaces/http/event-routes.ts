import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { decodeEvent } from '../../application/index.js';
import { EVENT_KINDS, topicFor } from '../../domain/index.js';
import type { EventKind } from '../../domain/index.js';

/**
 * Registers the event ingestion routes.
 *
 * POST /api/events/movie    → movie-events
 * POST /api/events/user     → user-events
 * POST /api/events/payment  → payment-events
 * GET  /api/events/health   process liveness only
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  // Bodies are read as text whatever their Content-Type; the handler decodes them.
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  for (const kind of EVENT_KINDS) {
    fastify.all(`/api/events/${kind}`, ingestHandler(fastify, kind));
  }

  /**
   * Health check. Does not touch the broker.
   */
  fastify.get(
    '/api/events/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({ status: true });
    },
  );
}

/**
 * POST only → decode → publish to the kind's topic → 201.
 *
 * The write is awaited before replying. A failed write is reported as 500
 * and not retried: callers that need at-least-once delivery must retry.
 */
function ingestHandler(fastify: FastifyInstance, kind: EventKind) {
  const topic = topicFor(kind);

  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (request.method !== 'POST') {
      return reply
        .status(405)
        .header('allow', 'POST')
        .send({ error: 'Method not allowed' });
    }

    const raw = typeof request.body === 'string' ? request.body : '';
    const decoded = decodeEvent(kind, raw);

    if (!decoded.ok) {
      request.log.info({ kind, issues: decoded.issues }, 'Rejected malformed event');
      return reply.status(400).send({
        error: 'Invalid event payload',
        issues: decoded.issues,
      });
    }

    const value = JSON.stringify(decoded.event);

    let offset: string;
    try {
      offset = await fastify.broker.publish(topic, value);
    } catch (err: unknown) {
      request.log.error({ err, topic }, 'Failed to write message to broker');
      return reply.status(500).send({ error: 'Failed to write message to broker' });
    }

    request.log.info({ topic, offset, value }, 'Produced message');

    return reply.status(201).send({ status: 'success' });
  };
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['broker'],
  fastify: '5.x',
});
