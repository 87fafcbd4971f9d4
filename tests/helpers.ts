import { vi } from 'vitest';
import type { Logger } from 'pino';
import { createPayload } from '../src/domain/index.js';
import type { Batch, Destination, Payload } from '../src/domain/index.js';
import type { FlushOutcome, Sink, SinkKind, SinkLimits } from '../src/infrastructure/sinks/types.js';

/** Minimal fake logger; `child()` returns the same instance so calls stay observable. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log;
}

export type FakeLogger = ReturnType<typeof fakeLogger>;

export function asLogger(log: FakeLogger): Logger {
  return log as unknown as Logger;
}

/** Payload of `size` ASCII bytes. */
export function makePayload(size = 10, partitionKey = '10.0.0.1', destination: Destination = 'good'): Payload {
  return createPayload(new TextEncoder().encode('x'.repeat(size)), partitionKey, destination);
}

export function makeBatch(payloads: Payload[], id = 1): Batch {
  return Object.freeze({
    id,
    destination: payloads[0]?.destination ?? 'good',
    payloads: Object.freeze([...payloads]),
    byteSize: payloads.reduce((n, p) => n + p.bytes.byteLength, 0),
    recordCount: payloads.length,
    openedAt: 0,
    sealedAt: 0,
  });
}

export interface ScriptedSink extends Sink {
  flushed: Batch[];
  /** Outcomes returned in order; the last one repeats. */
  outcomes: Array<FlushOutcome | ((batch: Batch) => FlushOutcome)>;
  probeResult: boolean;
  probeCalls: number;
}

const LIMITS: SinkLimits = { maxBatchBytes: 10_000, maxBatchRecords: 500, maxRecordBytes: 1_000 };

/** In-memory sink whose flush outcomes are scripted by the test. */
export function scriptedSink(name = 'good', kind: SinkKind = 'stream'): ScriptedSink {
  const sink: ScriptedSink = {
    name,
    kind,
    limits: LIMITS,
    flushed: [],
    outcomes: [{ kind: 'success' }],
    probeResult: true,
    probeCalls: 0,
    async flush(batch: Batch): Promise<FlushOutcome> {
      sink.flushed.push(batch);
      const next = sink.outcomes.length > 1 ? sink.outcomes.shift() : sink.outcomes[0];
      if (!next) return { kind: 'success' };
      return typeof next === 'function' ? next(batch) : next;
    },
    async probe(): Promise<boolean> {
      sink.probeCalls++;
      return sink.probeResult;
    },
  };
  return sink;
}

/** Resolves after pending microtasks and timers scheduled for `now` have run. */
export async function flushAsync(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
