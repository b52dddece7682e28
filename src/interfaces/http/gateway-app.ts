import Fastify from 'fastify';
import replyFrom from '@fastify/reply-from';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import { createRouter } from '../../application/index.js';
import type { RandomSource } from '../../domain/index.js';
import type { GatewayConfig } from '../../infrastructure/config/index.js';
import gatewayRoutes from './gateway-routes.js';

export interface GatewayAppOptions {
  config: Pick<GatewayConfig, 'origins' | 'migration'>;
  random: RandomSource;
  /** Logger for the server and its requests; silent when omitted. */
  logger?: FastifyBaseLogger;
}

/**
 * Builds the gateway: reply-from for forwarding, then the routing plugin
 * bound to the startup configuration and the injected random source.
 */
export async function buildGatewayApp(options: GatewayAppOptions): Promise<FastifyInstance> {
  const { config, random } = options;

  const fastify = Fastify({ loggerInstance: options.logger });

  await fastify.register(replyFrom);
  await fastify.register(gatewayRoutes, {
    origins: config.origins,
    route: createRouter(config.migration, random),
  });

  return fastify;
}
