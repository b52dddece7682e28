import { vi } from 'vitest';
import { pino } from 'pino';
import type { FastifyBaseLogger } from 'fastify';

/**
 * Silent pino logger with spies on the level methods used by the code.
 */
export function spyLogger() {
  const log = pino({ level: 'silent' });
  return {
    log,
    info: vi.spyOn(log, 'info'),
    warn: vi.spyOn(log, 'warn'),
    error: vi.spyOn(log, 'error'),
  };
}

/**
 * Logger whose children are itself, for asserting on request logs:
 * Fastify logs requests through `child()` loggers, which a spy on a
 * pino parent does not see.
 */
export function fakeLogger() {
  const fake = {
    level: 'info',
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
    child: vi.fn((): unknown => fake),
  };
  return {
    log: fake as unknown as FastifyBaseLogger,
    info: fake.info,
    warn: fake.warn,
    error: fake.error,
  };
}
