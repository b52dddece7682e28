import { z } from 'zod';
import type { MigrationSettings, Origin } from '../../domain/index.js';
import { flagSchema, formatIssues, originUrlSchema, portSchema } from './env.js';
import type { Env, LoadedConfig } from './env.js';

export interface GatewayConfig {
  readonly host: string;
  readonly port: number;
  readonly logLevel: string;
  readonly origins: Readonly<Record<Origin, URL>>;
  readonly migration: MigrationSettings;
  /** Seed for the routing random source, or null to use Math.random. */
  readonly seed: number | null;
}

const gatewayEnvSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: portSchema.default(8000),
  MONOLITH_URL: originUrlSchema.default('http://localhost:8080'),
  MOVIES_SERVICE_URL: originUrlSchema.default('http://localhost:8081'),
  EVENTS_SERVICE_URL: originUrlSchema.default('http://localhost:8082'),
  GRADUAL_MIGRATION: flagSchema,
  MOVIES_MIGRATION_PERCENT: z.string().default('0'),
  ROUTING_SEED: z
    .string()
    .regex(/^-?\d+$/, 'must be an integer')
    .transform(Number)
    .optional(),
  LOG_LEVEL: z.string().min(1).default('info'),
});

/**
 * Resolves the gateway configuration from the environment, once, at startup.
 *
 * Throws when an upstream URL cannot be parsed: the gateway must not start
 * with an unusable origin. A bad migration percentage is only a warning.
 */
export function loadGatewayConfig(env: Env = process.env): LoadedConfig<GatewayConfig> {
  const parsed = gatewayEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid gateway configuration: ${formatIssues(parsed.error)}`);
  }

  const e = parsed.data;
  const warnings: string[] = [];

  return {
    config: {
      host: e.HOST,
      port: e.PORT,
      logLevel: e.LOG_LEVEL,
      origins: {
        'monolith': e.MONOLITH_URL,
        'movies-service': e.MOVIES_SERVICE_URL,
        'events-service': e.EVENTS_SERVICE_URL,
      },
      migration: {
        enabled: e.GRADUAL_MIGRATION,
        percent: resolveMigrationPercent(e.MOVIES_MIGRATION_PERCENT, warnings),
      },
      seed: e.ROUTING_SEED ?? null,
    },
    warnings,
  };
}

/**
 * Non-integers fall back to 0; integers are clamped into [0,100].
 */
export function resolveMigrationPercent(raw: string, warnings: string[]): number {
  if (!/^[+-]?\d+$/.test(raw)) {
    warnings.push(`Invalid MOVIES_MIGRATION_PERCENT value "${raw}", defaulting to 0`);
    return 0;
  }

  const value = Number(raw);
  const clamped = Math.min(Math.max(value, 0), 100);
  if (clamped !== value) {
    warnings.push(`MOVIES_MIGRATION_PERCENT ${value} is outside [0,100], using ${clamped}`);
  }
  return clamped;
}
