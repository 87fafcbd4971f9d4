import { describe, it, expect, vi, beforeEach } from 'vitest';
import type Redis from 'ioredis';
import { createRedisStreamSink } from '../../../src/infrastructure/sinks/redis-stream-sink.js';
import { createRedisTopicSink } from '../../../src/infrastructure/sinks/redis-topic-sink.js';
import { createRedisQueueSink } from '../../../src/infrastructure/sinks/redis-queue-sink.js';
import { isTransientRedisError } from '../../../src/infrastructure/sinks/redis-outcome.js';
import { DEFAULT_SINK_LIMITS } from '../../../src/infrastructure/sinks/types.js';
import { makeBatch, makePayload } from '../../helpers.js';

/** In-process stand-in for the parts of ioredis the sinks call. */
function fakeRedis() {
  const pipeline = {
    xadd: vi.fn(),
    publish: vi.fn(),
    exec: vi.fn(),
  };
  const client = {
    pipeline: vi.fn(() => pipeline),
    exists: vi.fn(),
    pubsub: vi.fn(),
    rpush: vi.fn(),
    ping: vi.fn(),
  };
  return { client, pipeline, redis: client as unknown as Redis };
}

describe('isTransientRedisError', () => {
  it('retries connection loss, timeouts and server-side busy states', () => {
    expect(isTransientRedisError(new Error('Connection is closed.'))).toBe(true);
    expect(isTransientRedisError(new Error('Command timed out'))).toBe(true);
    expect(isTransientRedisError(new Error('LOADING Redis is loading the dataset in memory'))).toBe(true);
    expect(isTransientRedisError(new Error('OOM command not allowed'))).toBe(true);
    expect(isTransientRedisError('weird')).toBe(true);

    const maxRetries = new Error('Reached the max retries per request limit');
    maxRetries.name = 'MaxRetriesPerRequestError';
    expect(isTransientRedisError(maxRetries)).toBe(true);
  });

  it('treats command errors as permanent', () => {
    expect(isTransientRedisError(new Error('WRONGTYPE Operation against a key holding the wrong kind of value'))).toBe(false);
    expect(isTransientRedisError(new Error('ERR syntax error'))).toBe(false);
  });
});

describe('createRedisStreamSink', () => {
  let fake: ReturnType<typeof fakeRedis>;

  beforeEach(() => {
    fake = fakeRedis();
  });

  function sink(maxLen = 1000) {
    return createRedisStreamSink(fake.redis, {
      name: 'good',
      key: 'collector:good',
      limits: DEFAULT_SINK_LIMITS.stream,
      maxLen,
    });
  }

  it('adds one entry per payload to an existing stream', async () => {
    const p1 = makePayload(3, '10.0.0.1');
    const p2 = makePayload(4, '10.0.0.2');
    fake.pipeline.exec.mockResolvedValueOnce([[null, '1-0'], [null, '1-1']]);

    const outcome = await sink().flush(makeBatch([p1, p2]));

    expect(outcome).toEqual({ kind: 'success' });
    expect(fake.pipeline.xadd).toHaveBeenCalledTimes(2);
    expect(fake.pipeline.xadd).toHaveBeenNthCalledWith(
      1,
      'collector:good', 'NOMKSTREAM', 'MAXLEN', '~', 1000, '*', 'pk', '10.0.0.1', 'data', Buffer.from('xxx'),
    );
  });

  it('skips trimming when maxLen is 0', async () => {
    fake.pipeline.exec.mockResolvedValueOnce([[null, '1-0']]);

    await sink(0).flush(makeBatch([makePayload(2)]));

    expect(fake.pipeline.xadd).toHaveBeenCalledWith(
      'collector:good', 'NOMKSTREAM', '*', 'pk', '10.0.0.1', 'data', Buffer.from('xx'),
    );
  });

  it('retries every record when the stream does not exist', async () => {
    const payloads = [makePayload(), makePayload()];
    fake.pipeline.exec.mockResolvedValueOnce([[null, null], [null, null]]);

    const outcome = await sink().flush(makeBatch(payloads));

    expect(outcome).toEqual({
      kind: 'retryable',
      reason: 'stream collector:good does not exist',
      pending: payloads,
    });
  });

  it('splits replies into delivered, pending and rejected records', async () => {
    const [p1, p2, p3] = [makePayload(1), makePayload(2), makePayload(3)];
    fake.pipeline.exec.mockResolvedValueOnce([
      [null, '1-0'],
      [new Error('WRONGTYPE Operation against a key holding the wrong kind of value'), null],
      [new Error('LOADING Redis is loading the dataset in memory'), null],
    ]);

    const outcome = await sink().flush(makeBatch([p1, p2, p3]));

    expect(outcome).toEqual({
      kind: 'retryable',
      reason: 'LOADING Redis is loading the dataset in memory',
      pending: [p3],
      rejected: [{ payload: p2, reason: 'WRONGTYPE Operation against a key holding the wrong kind of value' }],
    });
  });

  it('reports rejected records alongside success', async () => {
    const [p1, p2] = [makePayload(1), makePayload(2)];
    fake.pipeline.exec.mockResolvedValueOnce([[null, '1-0'], [new Error('ERR value too large'), null]]);

    const outcome = await sink().flush(makeBatch([p1, p2]));

    expect(outcome).toEqual({ kind: 'success', rejected: [{ payload: p2, reason: 'ERR value too large' }] });
  });

  it('retries when the pipeline is discarded or throws', async () => {
    fake.pipeline.exec.mockResolvedValueOnce(null);
    await expect(sink().flush(makeBatch([makePayload()]))).resolves.toEqual({
      kind: 'retryable',
      reason: 'pipeline discarded',
    });

    fake.pipeline.exec.mockRejectedValueOnce(new Error('Connection is closed.'));
    await expect(sink().flush(makeBatch([makePayload()]))).resolves.toEqual({
      kind: 'retryable',
      reason: 'Connection is closed.',
    });
  });

  it('probes for the stream key', async () => {
    fake.client.exists.mockResolvedValueOnce(1).mockResolvedValueOnce(0);
    await expect(sink().probe()).resolves.toBe(true);
    await expect(sink().probe()).resolves.toBe(false);
    expect(fake.client.exists).toHaveBeenCalledWith('collector:good');
  });
});

describe('createRedisTopicSink', () => {
  let fake: ReturnType<typeof fakeRedis>;

  beforeEach(() => {
    fake = fakeRedis();
  });

  function sink() {
    return createRedisTopicSink(fake.redis, { name: 'good', channel: 'beacon', limits: DEFAULT_SINK_LIMITS.topic });
  }

  it('retries messages that reached no subscriber', async () => {
    const [p1, p2] = [makePayload(1), makePayload(2)];
    fake.pipeline.exec.mockResolvedValueOnce([[null, 1], [null, 0]]);

    const outcome = await sink().flush(makeBatch([p1, p2]));

    expect(fake.pipeline.publish).toHaveBeenNthCalledWith(1, 'beacon', Buffer.from('x'));
    expect(outcome).toEqual({ kind: 'retryable', reason: 'topic beacon has no subscribers', pending: [p2] });
  });

  it('is present only while someone subscribes', async () => {
    fake.client.pubsub.mockResolvedValueOnce(['beacon', 2]).mockResolvedValueOnce(['beacon', 0]);
    await expect(sink().probe()).resolves.toBe(true);
    await expect(sink().probe()).resolves.toBe(false);
    expect(fake.client.pubsub).toHaveBeenCalledWith('NUMSUB', 'beacon');
  });
});

describe('createRedisQueueSink', () => {
  let fake: ReturnType<typeof fakeRedis>;

  beforeEach(() => {
    fake = fakeRedis();
  });

  function sink() {
    return createRedisQueueSink(fake.redis, { name: 'bad', key: 'collector:bad', limits: DEFAULT_SINK_LIMITS.queue });
  }

  it('pushes the whole batch with one command', async () => {
    fake.client.rpush.mockResolvedValueOnce(2);

    const outcome = await sink().flush(makeBatch([makePayload(1), makePayload(2)]));

    expect(outcome).toEqual({ kind: 'success' });
    expect(fake.client.rpush).toHaveBeenCalledTimes(1);
    expect(fake.client.rpush).toHaveBeenCalledWith('collector:bad', Buffer.from('x'), Buffer.from('xx'));
  });

  it('retries transient failures', async () => {
    fake.client.rpush.mockRejectedValueOnce(new Error('Connection is closed.'));
    await expect(sink().flush(makeBatch([makePayload()]))).resolves.toEqual({
      kind: 'retryable',
      reason: 'Connection is closed.',
    });
  });

  it('gives up on command errors', async () => {
    fake.client.rpush.mockRejectedValueOnce(new Error('WRONGTYPE Operation against a key holding the wrong kind of value'));
    await expect(sink().flush(makeBatch([makePayload()]))).resolves.toEqual({
      kind: 'fatal',
      reason: 'WRONGTYPE Operation against a key holding the wrong kind of value',
    });
  });

  it('treats an empty batch as delivered', async () => {
    await expect(sink().flush(makeBatch([]))).resolves.toEqual({ kind: 'success' });
    expect(fake.client.rpush).not.toHaveBeenCalled();
  });

  it('probes with PING', async () => {
    fake.client.ping.mockResolvedValueOnce('PONG');
    await expect(sink().probe()).resolves.toBe(true);
  });
});
