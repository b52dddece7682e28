import { Redis, Cluster } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import type { FastifyBaseLogger } from 'fastify';

/** A single Redis node, or a cluster when several addresses are configured. */
export type BrokerConnection = Redis | Cluster;

export interface BrokerAddress {
  readonly host: string;
  readonly port: number;
}

const DEFAULT_PORT = 6379;

/**
 * Parses a comma-separated `host[:port]` list. Blank entries are skipped.
 * Throws on an entry whose port is not an integer in 1–65535.
 */
export function parseBrokerAddresses(list: string): BrokerAddress[] {
  const addresses = list
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '')
    .map(parseAddress);

  if (addresses.length === 0) {
    throw new Error('At least one broker address is required');
  }
  return addresses;
}

function parseAddress(entry: string): BrokerAddress {
  const colon = entry.lastIndexOf(':');
  if (colon === -1) {
    return { host: entry, port: DEFAULT_PORT };
  }

  const host = entry.slice(0, colon);
  const rawPort = entry.slice(colon + 1);
  const port = Number(rawPort);
  if (host === '' || !/^\d+$/.test(rawPort) || port < 1 || port > 65535) {
    throw new Error(`Invalid broker address "${entry}", expected host:port`);
  }
  return { host, port };
}

/**
 * Opens a broker connection. Connects lazily on the first command.
 *
 * Producers should pass a small `maxRetriesPerRequest` so a write fails
 * while the broker is down; consumers pass `null` so a blocking read
 * waits out reconnects instead of failing.
 *
 * Connection errors are logged through `log`; ioredis keeps reconnecting.
 */
export function createBrokerConnection(
  addresses: readonly BrokerAddress[],
  log: FastifyBaseLogger,
  options: RedisOptions = {},
): BrokerConnection {
  const redisOptions: RedisOptions = {
    enableReadyCheck: true,
    lazyConnect: true,
    ...options,
  };

  const [first, ...rest] = addresses;
  if (first === undefined) {
    throw new Error('At least one broker address is required');
  }

  const onError = (err: Error): void => {
    log.warn({ err }, 'Broker connection error');
  };

  if (rest.length === 0) {
    return new Redis({ ...redisOptions, host: first.host, port: first.port }).on('error', onError);
  }

  return new Cluster(
    addresses.map(({ host, port }) => ({ host, port })),
    { lazyConnect: true, redisOptions },
  ).on('error', onError);
}
