import type { MigrationSettings, RandomSource, RoutingDecision } from '../domain/index.js';

const MOVIES_PREFIX = '/api/movies';
const EVENTS_PREFIX = '/api/events';

/**
 * Picks the upstream origin for a request path.
 *
 * 1. `/api/movies*`: when migration is enabled, a fresh draw in [0,100)
 *    strictly below `percent` goes to movies-service, anything else to the
 *    monolith. Disabled migration never draws.
 * 2. `/api/events*`: always events-service.
 * 3. Everything else: the monolith.
 *
 * Draws are per request, not per client: the same caller may land on
 * different origins from one request to the next.
 */
export function resolveOrigin(
  path: string,
  migration: MigrationSettings,
  random: RandomSource,
): RoutingDecision {
  if (path.startsWith(MOVIES_PREFIX)) {
    if (!migration.enabled) {
      return { path, origin: 'monolith', roll: null };
    }
    const roll = random.nextInt(100);
    return {
      path,
      origin: roll < migration.percent ? 'movies-service' : 'monolith',
      roll,
    };
  }

  if (path.startsWith(EVENTS_PREFIX)) {
    return { path, origin: 'events-service', roll: null };
  }

  return { path, origin: 'monolith', roll: null };
}

export type Router = (path: string) => RoutingDecision;

/** Binds the startup migration settings and random source into a router. */
export function createRouter(migration: MigrationSettings, random: RandomSource): Router {
  return (path) => resolveOrigin(path, migration, random);
}

/**
 * Path a request is routed on: the request URL without its query,
 * percent-decoded. A malformed escape leaves the path as received.
 */
export function routingPath(requestUrl: string): string {
  const queryStart = requestUrl.indexOf('?');
  const raw = queryStart === -1 ? requestUrl : requestUrl.slice(0, queryStart);
  try {
    return decodeURI(raw);
  } catch (err: unknown) {
    if (err instanceof URIError) return raw;
    throw err;
  }
}
