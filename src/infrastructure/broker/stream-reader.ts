import { z } from 'zod';
import type { BrokerMessage, TopicReader } from '../../domain/index.js';
import type { BrokerConnection } from './connection.js';

// How long one XREADGROUP call blocks waiting for new messages (ms)
const BLOCK_MS = 5000;

/**
 * XREADGROUP reply: [[stream, [[id, [field, value, ...] | null], ...]], ...].
 * Fields are null for pending entries that were deleted from the stream.
 */
const readReplySchema = z
  .array(
    z.tuple([
      z.string(),
      z.array(z.tuple([z.string(), z.array(z.string()).nullable()])),
    ]),
  )
  .nullable();

/**
 * Reads one topic (a Redis Stream) as a member of a consumer group.
 *
 * The first reads drain this member's own pending entries (delivered
 * before a crash but never acknowledged), then the reader switches to
 * new entries with `>`. Nothing is acknowledged until `commit()`, so a
 * crash between read and commit leads to redelivery.
 *
 * The reader owns its connection: a blocking read ties the connection
 * up, so every topic needs its own.
 */
export class StreamTopicReader implements TopicReader {
  private cursor: '0' | '>' = '0';
  private groupReady = false;
  private abortHooked = false;

  constructor(
    private readonly connection: BrokerConnection,
    readonly topic: string,
    private readonly group: string,
    private readonly consumer: string,
    private readonly blockMs: number = BLOCK_MS,
  ) {}

  async read(signal: AbortSignal): Promise<BrokerMessage | null> {
    if (signal.aborted) return null;
    this.hookAbort(signal);

    try {
      await this.ensureGroup();

      while (!signal.aborted) {
        const reply: unknown = this.cursor === '0'
          ? await this.connection.xreadgroup(
            'GROUP', this.group, this.consumer,
            'COUNT', 1,
            'STREAMS', this.topic,
            '0',
          )
          : await this.connection.xreadgroup(
            'GROUP', this.group, this.consumer,
            'COUNT', 1,
            'BLOCK', this.blockMs,
            'STREAMS', this.topic,
            '>',
          );

        const entry = firstEntry(reply, this.topic);

        if (entry === null) {
          // Pending list drained (or block timed out on new entries)
          this.cursor = '>';
          continue;
        }

        const [id, fields] = entry;
        if (fields === null) {
          // Deleted while pending: nothing to deliver, just clear it
          await this.connection.xack(this.topic, this.group, id);
          continue;
        }

        return toMessage(this.topic, id, fields);
      }
    } catch (err: unknown) {
      // Aborting disconnects the socket, which rejects the in-flight read
      if (signal.aborted) return null;
      throw err;
    }

    return null;
  }

  async commit(message: BrokerMessage): Promise<void> {
    await this.connection.xack(this.topic, this.group, message.offset);
  }

  async close(): Promise<void> {
    this.connection.disconnect();
  }

  /**
   * Creates the consumer group if missing.
   *
   * Start id "0" = a brand-new group reads the topic from the beginning.
   * MKSTREAM creates the stream if nothing was published yet.
   * BUSYGROUP (group already exists) is expected on every start but the first.
   */
  private async ensureGroup(): Promise<void> {
    if (this.groupReady) return;

    try {
      await this.connection.xgroup('CREATE', this.topic, this.group, '0', 'MKSTREAM');
    } catch (err: unknown) {
      if (!(err instanceof Error && err.message.includes('BUSYGROUP'))) {
        throw err;
      }
    }
    this.groupReady = true;
  }

  private hookAbort(signal: AbortSignal): void {
    if (this.abortHooked) return;
    this.abortHooked = true;
    signal.addEventListener('abort', () => this.connection.disconnect(), { once: true });
  }
}

function firstEntry(reply: unknown, topic: string): [string, string[] | null] | null {
  const parsed = readReplySchema.safeParse(reply);
  if (!parsed.success) {
    throw new Error(`Unexpected XREADGROUP reply for ${topic}`);
  }

  const stream = parsed.data?.[0];
  return stream?.[1][0] ?? null;
}

/** Stream entries arrive as flat [field, value, field, value, ...] arrays. */
function toMessage(topic: string, offset: string, fields: string[]): BrokerMessage {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  return {
    topic,
    offset,
    key: map.get('key') ?? null,
    value: map.get('value') ?? '',
  };
}
