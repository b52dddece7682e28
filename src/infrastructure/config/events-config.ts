import { hostname } from 'node:os';
import { z } from 'zod';
import { parseBrokerAddresses } from '../broker/connection.js';
import type { BrokerAddress } from '../broker/connection.js';
import { flagSchema, formatIssues, portSchema } from './env.js';
import type { Env, LoadedConfig } from './env.js';

export interface EventsConfig {
  readonly host: string;
  readonly port: number;
  readonly logLevel: string;
  readonly brokers: readonly BrokerAddress[];
  /**
   * Member name inside the shared consumer group. Must survive a restart:
   * a member only re-reads its own unacknowledged entries.
   */
  readonly consumerName: string;
  /** Restart failed consumer loops with backoff instead of leaving them stopped. */
  readonly consumerRestart: boolean;
}

const eventsEnvSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: portSchema.default(8082),
  BROKERS: z.string().default('localhost:6379'),
  CONSUMER_NAME: z.string().min(1).optional(),
  CONSUMER_RESTART: flagSchema,
  LOG_LEVEL: z.string().min(1).default('info'),
});

/**
 * Resolves the event service configuration from the environment.
 * Throws on an unparseable port or broker address.
 */
export function loadEventsConfig(env: Env = process.env): LoadedConfig<EventsConfig> {
  const parsed = eventsEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid event service configuration: ${formatIssues(parsed.error)}`);
  }

  const e = parsed.data;

  return {
    config: {
      host: e.HOST,
      port: e.PORT,
      logLevel: e.LOG_LEVEL,
      brokers: parseBrokerAddresses(e.BROKERS),
      consumerName: e.CONSUMER_NAME ?? hostname(),
      consumerRestart: e.CONSUMER_RESTART,
    },
    warnings: [],
  };
}
