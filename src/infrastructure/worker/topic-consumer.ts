import type { FastifyBaseLogger } from 'fastify';
import type { TopicReader, TopicReaderFactory } from '../../domain/index.js';

export type ConsumerExit = 'stopped' | 'failed';

export interface ConsumerOutcome {
  readonly exit: ConsumerExit;
  /** Messages logged and committed before the loop ended. */
  readonly delivered: number;
}

export interface RestartPolicy {
  readonly enabled: boolean;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

/** A failed loop stays stopped; the rest of the process carries on degraded. */
export const NO_RESTART: RestartPolicy = { enabled: false, baseDelayMs: 1000, maxDelayMs: 30_000 };

export const RESTART_WITH_BACKOFF: RestartPolicy = { ...NO_RESTART, enabled: true };

/**
 * Consumer loop for one topic.
 *
 * read → log → commit, until the signal is aborted. There is no business
 * processing: the loop only demonstrates that events arrive.
 *
 * A read or commit error ends this loop only (exit `failed`). It never
 * throws, so it cannot take down the HTTP server or the other loops.
 * The reader is always closed on the way out.
 */
export async function consumeTopic(
  reader: TopicReader,
  log: FastifyBaseLogger,
  signal: AbortSignal,
): Promise<ConsumerOutcome> {
  const topic = reader.topic;
  let exit: ConsumerExit = 'stopped';
  let delivered = 0;

  log.info({ topic }, 'Consumer started');

  try {
    while (!signal.aborted) {
      const message = await reader.read(signal);
      if (message === null) break;

      log.info(
        { topic: message.topic, offset: message.offset, key: message.key, value: message.value },
        'Received message',
      );

      await reader.commit(message);
      delivered++;
    }
  } catch (err: unknown) {
    if (!signal.aborted) {
      log.error({ err, topic }, 'Error reading from topic, consumer stopped');
      exit = 'failed';
    }
  }

  try {
    await reader.close();
  } catch (err: unknown) {
    log.warn({ err, topic }, 'Failed to close topic reader');
  }

  log.info({ topic, exit, delivered }, 'Consumer exited');
  return { exit, delivered };
}

/**
 * Exponential backoff with ±25% jitter, capped at `maxDelayMs`.
 */
export function restartDelay(
  attempt: number,
  policy: RestartPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, attempt);
  const capped = Math.min(exponential, policy.maxDelayMs);
  const jitter = capped * 0.25 * (random() * 2 - 1);
  return Math.max(0, Math.floor(capped + jitter));
}

/**
 * Runs the loop for one topic, restarting it on a fresh reader after a
 * failure when the policy allows. The backoff resets once a restarted loop
 * has delivered at least one message.
 */
export async function superviseTopic(
  topic: string,
  createReader: TopicReaderFactory,
  log: FastifyBaseLogger,
  signal: AbortSignal,
  policy: RestartPolicy = NO_RESTART,
): Promise<void> {
  let attempt = 0;

  while (!signal.aborted) {
    let outcome: ConsumerOutcome;
    try {
      outcome = await consumeTopic(createReader(topic), log, signal);
    } catch (err: unknown) {
      log.error({ err, topic }, 'Failed to create topic reader');
      outcome = { exit: 'failed', delivered: 0 };
    }

    if (outcome.exit === 'stopped' || !policy.enabled) return;

    if (outcome.delivered > 0) attempt = 0;
    const delayMs = restartDelay(attempt, policy);
    attempt++;

    log.warn({ topic, attempt, delayMs }, 'Restarting consumer after failure');
    await sleep(delayMs, signal);
  }
}

/**
 * Starts one independent loop per topic. Resolves once every loop has
 * exited, which only happens on failure (without restarts) or shutdown.
 */
export async function startConsumers(
  topics: readonly string[],
  createReader: TopicReaderFactory,
  log: FastifyBaseLogger,
  signal: AbortSignal,
  policy: RestartPolicy = NO_RESTART,
): Promise<void> {
  await Promise.all(
    topics.map((topic) => superviseTopic(topic, createReader, log, signal, policy)),
  );
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
