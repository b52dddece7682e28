import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { EventPublisher } from '../../domain/index.js';

export interface BrokerPluginOptions {
  publisher: EventPublisher;
}

/**
 * Fastify plugin that owns the shared publisher's lifecycle.
 *
 * - Decorates `fastify.broker` for use by the ingestion routes.
 * - Closes the publisher when the server closes.
 */
async function brokerPlugin(fastify: FastifyInstance, opts: BrokerPluginOptions): Promise<void> {
  const { publisher } = opts;

  fastify.decorate('broker', publisher);

  fastify.addHook('onClose', async () => {
    await publisher.close();
    fastify.log.info('Broker publisher closed');
  });
}

export default fp(brokerPlugin, {
  name: 'broker',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.broker` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    broker: EventPublisher;
  }
}
