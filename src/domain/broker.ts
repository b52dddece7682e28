/**
 * Broker-facing contracts.
 *
 * The HTTP layer only sees `EventPublisher`; the consumer loops only see
 * `TopicReader`. Concrete implementations live in infrastructure/broker.
 */

/** A message as delivered to a consumer loop. */
export interface BrokerMessage {
  readonly topic: string;
  /** Broker-assigned position of the message within its topic. */
  readonly offset: string;
  /** Messages are written without a key, so this is normally null. */
  readonly key: string | null;
  readonly value: string;
}

/**
 * Write side of the broker. One instance is shared by every request handler
 * and must be safe to call concurrently.
 */
export interface EventPublisher {
  /** Appends `value` to `topic` and resolves with the offset it was written at. */
  publish(topic: string, value: string): Promise<string>;
  close(): Promise<void>;
}

/**
 * Read side of the broker for a single topic and consumer group member.
 */
export interface TopicReader {
  readonly topic: string;
  /**
   * Blocks until the next message is available.
   * Resolves with `null` when `signal` was aborted while waiting.
   */
  read(signal: AbortSignal): Promise<BrokerMessage | null>;
  /** Acknowledges a message so the group does not redeliver it. */
  commit(message: BrokerMessage): Promise<void>;
  close(): Promise<void>;
}

/** Builds a fresh reader for a topic. Called again on every supervised restart. */
export type TopicReaderFactory = (topic: string) => TopicReader;
