import type { EventKind } from './event.js';

/** Fixed topic per event kind. */
export const TOPICS = {
  movie: 'movie-events',
  user: 'user-events',
  payment: 'payment-events',
} as const satisfies Record<EventKind, string>;

export type Topic = (typeof TOPICS)[EventKind];

/** Every topic, in the order the consumer loops are started. */
export const ALL_TOPICS: readonly Topic[] = [TOPICS.movie, TOPICS.user, TOPICS.payment];

/**
 * Shared by every consumer loop in every process, so that scaling out
 * splits the stream between members instead of duplicating reads.
 */
export const CONSUMER_GROUP = 'events-consumer-group';

export function topicFor(kind: EventKind): Topic {
  return TOPICS[kind];
}
