import { describe, it, expect, vi } from 'vitest';
import type Redis from 'ioredis';
import { createStdoutSink } from '../../../src/infrastructure/sinks/stdout-sink.js';
import { createSink, needsRedis } from '../../../src/infrastructure/sinks/create-sink.js';
import type { SinkSpec } from '../../../src/infrastructure/sinks/create-sink.js';
import { DEFAULT_SINK_LIMITS } from '../../../src/infrastructure/sinks/types.js';
import { createPayload } from '../../../src/domain/index.js';
import { makeBatch } from '../../helpers.js';

describe('createStdoutSink', () => {
  it('writes one base64 line per payload in a single write', async () => {
    const out = { write: vi.fn(() => true) };
    const sink = createStdoutSink({ name: 'good', limits: DEFAULT_SINK_LIMITS.stdout, out });
    const encoder = new TextEncoder();

    const outcome = await sink.flush(
      makeBatch([createPayload(encoder.encode('ab'), 'k', 'good'), createPayload(encoder.encode('cd'), 'k', 'good')]),
    );

    expect(outcome).toEqual({ kind: 'success' });
    expect(out.write).toHaveBeenCalledTimes(1);
    expect(out.write).toHaveBeenCalledWith('YWI=\nY2Q=\n');
    await expect(sink.probe()).resolves.toBe(true);
  });
});

describe('createSink', () => {
  const spec = (type: SinkSpec['type']): SinkSpec => ({
    sink: 'good',
    type,
    target: 'collector:good',
    limits: DEFAULT_SINK_LIMITS[type],
    streamMaxLen: 0,
  });

  it('builds a stdout sink without a Redis client', () => {
    const sink = createSink(spec('stdout'), {});
    expect(sink.kind).toBe('stdout');
    expect(sink.name).toBe('good');
  });

  it('requires a Redis client for Redis-backed kinds', () => {
    expect(() => createSink(spec('stream'), {})).toThrow('Sink "good" of type stream needs a Redis client');
  });

  it('builds the variant matching the configured type', () => {
    const redis = {} as unknown as Redis;
    expect(createSink(spec('stream'), { redis }).kind).toBe('stream');
    expect(createSink(spec('queue'), { redis }).kind).toBe('queue');
    expect(createSink(spec('topic'), { redis }).kind).toBe('topic');
  });

  it('only needs Redis when a sink writes through it', () => {
    expect(needsRedis(['stdout', 'stdout'])).toBe(false);
    expect(needsRedis(['stdout', 'queue'])).toBe(true);
  });
});
