import type { Batch } from '../../domain/index.js';
import type { FlushOutcome, Sink, SinkLimits } from './types.js';

/** Anything line-oriented the sink can write to; `process.stdout` by default. */
export interface LineWriter {
  write(chunk: string): boolean;
}

export interface StdoutSinkOptions {
  name: string;
  limits: SinkLimits;
  out?: LineWriter;
}

/**
 * Local-only sink for development and tests: prints every payload as one
 * base64 line.
 */
export function createStdoutSink(options: StdoutSinkOptions): Sink {
  const out = options.out ?? process.stdout;

  async function flush(batch: Batch): Promise<FlushOutcome> {
    const lines = batch.payloads.map((payload) => Buffer.from(payload.bytes).toString('base64'));
    if (lines.length > 0) out.write(`${lines.join('\n')}\n`);
    return { kind: 'success' };
  }

  return {
    name: options.name,
    kind: 'stdout',
    limits: options.limits,
    flush,
    probe: async () => true,
  };
}
