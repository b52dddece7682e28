import { pino } from 'pino';
import { ALL_TOPICS, CONSUMER_GROUP } from './domain/index.js';
import type { TopicReaderFactory } from './domain/index.js';
import {
  createBrokerConnection,
  StreamPublisher,
  StreamTopicReader,
} from './infrastructure/broker/index.js';
import { loadEventsConfig } from './infrastructure/config/index.js';
import { NO_RESTART, RESTART_WITH_BACKOFF, startConsumers } from './infrastructure/worker/index.js';
import { buildEventsApp } from './interfaces/http/index.js';

/**
 * Event service process: ingestion HTTP surface plus one consumer loop per
 * topic, all running side by side from startup.
 *
 * The publisher is created once and shared by every handler. Each consumer
 * loop gets its own connection because blocking reads hold the socket.
 */
async function main(): Promise<void> {
  const { config } = loadEventsConfig(process.env);
  const log = pino({ level: config.logLevel });

  const publisher = new StreamPublisher(
    createBrokerConnection(config.brokers, log, { maxRetriesPerRequest: 1 }),
  );

  const fastify = await buildEventsApp({ publisher, logger: log });

  const createReader: TopicReaderFactory = (topic) =>
    new StreamTopicReader(
      createBrokerConnection(config.brokers, log, { maxRetriesPerRequest: null }),
      topic,
      CONSUMER_GROUP,
      config.consumerName,
    );

  // Abort controller for graceful shutdown
  const ac = new AbortController();

  const consumers = startConsumers(
    ALL_TOPICS,
    createReader,
    fastify.log,
    ac.signal,
    config.consumerRestart ? RESTART_WITH_BACKOFF : NO_RESTART,
  );

  const shutdown = (): void => {
    fastify.log.info('Shutting down event service...');
    ac.abort();

    Promise.all([consumers, fastify.close()]).then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({ host: config.host, port: config.port });

  fastify.log.info(
    {
      brokers: config.brokers.map(({ host, port }) => `${host}:${port}`),
      group: CONSUMER_GROUP,
      consumer: config.consumerName,
      restartConsumers: config.consumerRestart,
    },
    'Event service started',
  );

  await consumers;

  // The HTTP surface keeps serving after every loop has gone.
  fastify.log.warn('All consumer loops have exited');
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start event service', err);
  process.exit(1);
});
