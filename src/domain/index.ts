export { EVENT_KINDS } from './event.js';
export type { EventKind, MovieEvent, UserEvent, PaymentEvent, DomainEvent } from './event.js';
export { TOPICS, ALL_TOPICS, CONSUMER_GROUP, topicFor } from './topics.js';
export type { Topic } from './topics.js';
export type { BrokerMessage, EventPublisher, TopicReader, TopicReaderFactory } from './broker.js';
export type { Origin, MigrationSettings, RoutingDecision, RandomSource } from './routing.js';
