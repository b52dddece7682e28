import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { buildUpstreamUrl, routingPath } from '../../application/index.js';
import type { Router } from '../../application/index.js';
import type { Origin } from '../../domain/index.js';

export const HEALTH_BODY = 'Strangler Fig Proxy is healthy';

export interface GatewayRoutesOptions {
  origins: Readonly<Record<Origin, URL>>;
  route: Router;
}

/**
 * Registers the gateway routes.
 *
 * /health       fixed text body for any method; never consults the upstreams
 * anything else  proxied to the origin chosen by `route`
 *
 * Requires `@fastify/reply-from` to be registered first.
 */
async function gatewayRoutes(fastify: FastifyInstance, opts: GatewayRoutesOptions): Promise<void> {

  // Pass request bodies through as raw streams; the gateway never parses them.
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', (_request, payload, done) => {
    done(null, payload);
  });

  fastify.all('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).type('text/plain').send(HEALTH_BODY);
  });

  const forward = async (request: FastifyRequest, reply: FastifyReply) => {
    const path = routingPath(request.url);
    const decision = opts.route(path);
    const base = opts.origins[decision.origin];
    const target = buildUpstreamUrl(base, request.url);

    request.log.info(
      { method: request.method, path, origin: decision.origin, roll: decision.roll },
      `Routing to ${decision.origin}`,
    );

    // No retry: a failed forward is answered with 502 and logged.
    return reply.from(target, {
      rewriteRequestHeaders: (_request, headers) => ({ ...headers, host: base.host }),
      onError: (errorReply, { error }) => {
        errorReply.log.error(
          { err: error, origin: decision.origin, target },
          'Upstream request failed',
        );
        errorReply.status(502).send({
          error: 'Bad Gateway',
          message: `Upstream ${decision.origin} unavailable`,
        });
      },
    });
  };

  fastify.all('/', forward);
  fastify.all('/*', forward);
}

export default fp(gatewayRoutes, {
  name: 'gateway-routes',
  dependencies: ['@fastify/reply-from'],
  fastify: '5.x',
});
