import type { EventPublisher } from '../../domain/index.js';
import type { BrokerConnection } from './connection.js';

/**
 * Appends events to a Redis Stream per topic.
 *
 * Uses `XADD` with auto-generated ids (`*`); the id is returned as the
 * message offset. Entries carry a single `value` field and no key.
 * One instance is shared by all request handlers: ioredis pipelines
 * concurrent commands over the same connection.
 */
export class StreamPublisher implements EventPublisher {
  constructor(private readonly connection: BrokerConnection) {}

  async publish(topic: string, value: string): Promise<string> {
    const offset = await this.connection.xadd(topic, '*', 'value', value);
    if (offset === null) {
      throw new Error(`Broker did not accept the write to ${topic}`);
    }
    return offset;
  }

  async close(): Promise<void> {
    await this.connection.quit();
  }
}
