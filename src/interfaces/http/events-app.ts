import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import { brokerPlugin } from '../../infrastructure/broker/index.js';
import type { EventPublisher } from '../../domain/index.js';
import eventRoutes from './event-routes.js';

export interface EventsAppOptions {
  publisher: EventPublisher;
  /** Logger for the server and its requests; silent when omitted. */
  logger?: FastifyBaseLogger;
}

/**
 * Builds the event service's HTTP surface around an already constructed
 * publisher. The caller owns listen(); close() also closes the publisher.
 */
export async function buildEventsApp(options: EventsAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ loggerInstance: options.logger });

  await fastify.register(brokerPlugin, { publisher: options.publisher });
  await fastify.register(eventRoutes);

  return fastify;
}
