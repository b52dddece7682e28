import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Redis } from 'ioredis';
import {
  StreamPublisher,
  StreamTopicReader,
  createBrokerConnection,
  parseBrokerAddresses,
} from '../../src/infrastructure/broker/index.js';
import type { BrokerConnection } from '../../src/infrastructure/broker/index.js';
import { spyLogger } from '../helpers/logger.js';

/** Minimal fake of the ioredis commands the stream adapters use. */
function fakeConnection() {
  return {
    xadd: vi.fn(),
    xgroup: vi.fn().mockResolvedValue('OK'),
    xreadgroup: vi.fn(),
    xack: vi.fn().mockResolvedValue(1),
    quit: vi.fn().mockResolvedValue('OK'),
    disconnect: vi.fn(),
  };
}

type FakeConnection = ReturnType<typeof fakeConnection>;

function asConnection(fake: FakeConnection): BrokerConnection {
  return fake as unknown as BrokerConnection;
}

describe('parseBrokerAddresses', () => {
  it('defaults the port to 6379', () => {
    expect(parseBrokerAddresses('localhost')).toEqual([{ host: 'localhost', port: 6379 }]);
  });

  it('rejects a port out of range', () => {
    expect(() => parseBrokerAddresses('redis:70000')).toThrow('Invalid broker address "redis:70000"');
  });

  it('rejects a missing host', () => {
    expect(() => parseBrokerAddresses(':6379')).toThrow('Invalid broker address ":6379"');
  });
});

describe('createBrokerConnection', () => {
  it('opens a single node for one address without connecting yet', () => {
    const logger = spyLogger();
    const connection = createBrokerConnection([{ host: '127.0.0.1', port: 6390 }], logger.log);

    expect(connection).toBeInstanceOf(Redis);
    expect(connection.status).toBe('wait');
    connection.disconnect();
  });

  it('logs connection errors', () => {
    const logger = spyLogger();
    const connection = createBrokerConnection([{ host: '127.0.0.1', port: 6390 }], logger.log);
    const error = new Error('connect ECONNREFUSED 127.0.0.1:6390');

    connection.emit('error', error);

    expect(logger.warn).toHaveBeenCalledWith({ err: error }, 'Broker connection error');
    connection.disconnect();
  });
});

describe('StreamPublisher', () => {
  let fake: FakeConnection;

  beforeEach(() => {
    fake = fakeConnection();
  });

  it('appends the value to the topic stream and returns the entry id', async () => {
    fake.xadd.mockResolvedValueOnce('1700000000000-0');
    const publisher = new StreamPublisher(asConnection(fake));

    const offset = await publisher.publish('movie-events', '{"movie_id":1}');

    expect(offset).toBe('1700000000000-0');
    expect(fake.xadd).toHaveBeenCalledWith('movie-events', '*', 'value', '{"movie_id":1}');
  });

  it('propagates write failures', async () => {
    fake.xadd.mockRejectedValueOnce(new Error('Connection is closed.'));
    const publisher = new StreamPublisher(asConnection(fake));

    await expect(publisher.publish('user-events', '{}')).rejects.toThrow('Connection is closed.');
  });

  it('fails when the broker returns no id', async () => {
    fake.xadd.mockResolvedValueOnce(null);
    const publisher = new StreamPublisher(asConnection(fake));

    await expect(publisher.publish('user-events', '{}'))
      .rejects.toThrow('Broker did not accept the write to user-events');
  });

  it('quits the connection on close', async () => {
    await new StreamPublisher(asConnection(fake)).close();
    expect(fake.quit).toHaveBeenCalledOnce();
  });
});

describe('StreamTopicReader', () => {
  let fake: FakeConnection;
  let ac: AbortController;

  beforeEach(() => {
    fake = fakeConnection();
    ac = new AbortController();
  });

  function reader(): StreamTopicReader {
    return new StreamTopicReader(asConnection(fake), 'movie-events', 'events-consumer-group', 'member-1', 10);
  }

  it('creates the group from the start of the stream', async () => {
    fake.xreadgroup.mockResolvedValueOnce([['movie-events', [['1-0', ['value', 'a']]]]]);

    await reader().read(ac.signal);

    expect(fake.xgroup).toHaveBeenCalledWith('CREATE', 'movie-events', 'events-consumer-group', '0', 'MKSTREAM');
  });

  it('tolerates an existing group', async () => {
    fake.xgroup.mockRejectedValueOnce(new Error('BUSYGROUP Consumer Group name already exists'));
    fake.xreadgroup.mockResolvedValueOnce([['movie-events', [['1-0', ['value', 'a']]]]]);

    const message = await reader().read(ac.signal);

    expect(message?.value).toBe('a');
  });

  it('propagates other group errors', async () => {
    fake.xgroup.mockRejectedValueOnce(new Error('WRONGTYPE Operation against a key holding the wrong kind of value'));

    await expect(reader().read(ac.signal)).rejects.toThrow('WRONGTYPE');
  });

  it('drains pending entries before reading new ones', async () => {
    fake.xreadgroup
      .mockResolvedValueOnce([['movie-events', [['1-0', ['value', 'pending']]]]])
      .mockResolvedValueOnce([['movie-events', []]])
      .mockResolvedValueOnce([['movie-events', [['2-0', ['value', 'fresh']]]]]);

    const r = reader();
    const first = await r.read(ac.signal);
    const second = await r.read(ac.signal);

    expect(first).toEqual({ topic: 'movie-events', offset: '1-0', key: null, value: 'pending' });
    expect(second).toEqual({ topic: 'movie-events', offset: '2-0', key: null, value: 'fresh' });

    expect(fake.xreadgroup).toHaveBeenNthCalledWith(
      1,
      'GROUP', 'events-consumer-group', 'member-1', 'COUNT', 1, 'STREAMS', 'movie-events', '0',
    );
    expect(fake.xreadgroup).toHaveBeenNthCalledWith(
      3,
      'GROUP', 'events-consumer-group', 'member-1', 'COUNT', 1, 'BLOCK', 10, 'STREAMS', 'movie-events', '>',
    );
    expect(fake.xgroup).toHaveBeenCalledOnce();
  });

  it('keeps blocking across timeouts', async () => {
    fake.xreadgroup
      .mockResolvedValueOnce([['movie-events', []]])
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce([['movie-events', [['5-0', ['value', 'late']]]]]);

    const message = await reader().read(ac.signal);

    expect(message?.offset).toBe('5-0');
    expect(fake.xreadgroup).toHaveBeenCalledTimes(4);
  });

  it('acknowledges and skips pending entries that were deleted', async () => {
    fake.xreadgroup
      .mockResolvedValueOnce([['movie-events', [['1-0', null]]]])
      .mockResolvedValueOnce([['movie-events', [['2-0', ['value', 'b']]]]]);

    const message = await reader().read(ac.signal);

    expect(fake.xack).toHaveBeenCalledWith('movie-events', 'events-consumer-group', '1-0');
    expect(message?.offset).toBe('2-0');
  });

  it('reads the key field when present', async () => {
    fake.xreadgroup.mockResolvedValueOnce([['movie-events', [['1-0', ['key', 'movie-1', 'value', 'v']]]]]);

    const message = await reader().read(ac.signal);

    expect(message).toEqual({ topic: 'movie-events', offset: '1-0', key: 'movie-1', value: 'v' });
  });

  it('commits by acknowledging the entry id', async () => {
    await reader().commit({ topic: 'movie-events', offset: '7-0', key: null, value: 'x' });
    expect(fake.xack).toHaveBeenCalledWith('movie-events', 'events-consumer-group', '7-0');
  });

  it('surfaces read errors', async () => {
    fake.xreadgroup.mockRejectedValueOnce(new Error('NOGROUP No such key'));
    await expect(reader().read(ac.signal)).rejects.toThrow('NOGROUP');
  });

  it('rejects a reply it cannot parse', async () => {
    fake.xreadgroup.mockResolvedValueOnce('garbage');
    await expect(reader().read(ac.signal)).rejects.toThrow('Unexpected XREADGROUP reply for movie-events');
  });

  it('returns null instead of throwing once aborted', async () => {
    const r = reader();
    fake.xreadgroup.mockImplementationOnce(async () => {
      ac.abort();
      throw new Error('Connection is closed.');
    });

    await expect(r.read(ac.signal)).resolves.toBeNull();
    expect(fake.disconnect).toHaveBeenCalledOnce();
  });

  it('returns null immediately when already aborted', async () => {
    ac.abort();
    await expect(reader().read(ac.signal)).resolves.toBeNull();
    expect(fake.xreadgroup).not.toHaveBeenCalled();
  });

  it('disconnects on close', async () => {
    await reader().close();
    expect(fake.disconnect).toHaveBeenCalledOnce();
  });
});
