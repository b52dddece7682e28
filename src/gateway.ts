import { pino } from 'pino';
import { mathRandom, seededRandom } from './application/index.js';
import { loadGatewayConfig } from './infrastructure/config/index.js';
import { buildGatewayApp } from './interfaces/http/index.js';

/**
 * Gateway process.
 *
 * Order:
 * 1) Resolve configuration (fatal on an unparseable upstream URL)
 * 2) Build the app with the random source seeded once
 * 3) Register shutdown handlers
 * 4) listen()
 */
async function main(): Promise<void> {
  const { config, warnings } = loadGatewayConfig(process.env);

  const random = config.seed === null ? mathRandom : seededRandom(config.seed);

  const fastify = await buildGatewayApp({
    config,
    random,
    logger: pino({ level: config.logLevel }),
  });

  for (const warning of warnings) {
    fastify.log.warn(warning);
  }

  const shutdown = (): void => {
    fastify.log.info('Shutting down gateway...');
    fastify.close().then(
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
      port: config.port,
      monolith: config.origins['monolith'].href,
      moviesService: config.origins['movies-service'].href,
      eventsService: config.origins['events-service'].href,
      migrationEnabled: config.migration.enabled,
      migrationPercent: config.migration.percent,
      seeded: config.seed !== null,
    },
    'Strangler Fig proxy started',
  );
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start gateway', err);
  process.exit(1);
});
