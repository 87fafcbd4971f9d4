import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Warmup } from '../../src/application/warmup.js';
import { asLogger, fakeLogger } from '../helpers.js';
import type { FakeLogger } from '../helpers.js';

describe('Warmup', () => {
  let log: FakeLogger;

  beforeEach(() => {
    log = fakeLogger();
  });

  it('is ready at once when disabled', async () => {
    const warmup = new Warmup({ enabled: false, maxAttempts: 3, intervalMs: 5 }, asLogger(log));
    expect(warmup.isReady()).toBe(true);
    const request = vi.fn(async () => true);

    await expect(warmup.run(request)).resolves.toEqual({ status: 'disabled' });
    expect(request).not.toHaveBeenCalled();
  });

  it('retries until a round trip succeeds', async () => {
    const warmup = new Warmup({ enabled: true, maxAttempts: 5, intervalMs: 5 }, asLogger(log));
    expect(warmup.isReady()).toBe(false);

    const result = await warmup.run(async (attempt) => attempt >= 3);

    expect(result).toEqual({ status: 'succeeded', attempts: 3 });
    expect(warmup.isReady()).toBe(true);
    expect(log.info).toHaveBeenCalledWith({ attempts: 3 }, 'Warmup complete, collector is ready');
  });

  it('marks ready with a warning when attempts run out', async () => {
    const warmup = new Warmup({ enabled: true, maxAttempts: 3, intervalMs: 5 }, asLogger(log));
    const request = vi.fn(async () => false);

    const result = await warmup.run(request);

    expect(result).toEqual({ status: 'exhausted', attempts: 3 });
    expect(request).toHaveBeenCalledTimes(3);
    expect(warmup.isReady()).toBe(true);
    expect(log.warn).toHaveBeenCalledWith(
      { attempts: 3 },
      'Warmup attempts exhausted without a successful round trip, marking ready',
    );
  });

  it('counts a failing request as an unsuccessful attempt', async () => {
    const warmup = new Warmup({ enabled: true, maxAttempts: 2, intervalMs: 5 }, asLogger(log));
    const request = vi
      .fn<(attempt: number) => Promise<boolean>>()
      .mockRejectedValueOnce(new Error('ECONNREFUSED'))
      .mockResolvedValueOnce(true);

    const result = await warmup.run(request);

    expect(result).toEqual({ status: 'succeeded', attempts: 2 });
    expect(log.debug).toHaveBeenCalledWith(
      { err: expect.any(Error), attempt: 1 },
      'Warmup request failed',
    );
  });

  it('stops when cancelled and stays warming', async () => {
    const warmup = new Warmup({ enabled: true, maxAttempts: 10, intervalMs: 60_000 }, asLogger(log));

    const result = await warmup.run(async () => {
      warmup.cancel();
      return false;
    });

    expect(result).toEqual({ status: 'cancelled', attempts: 1 });
    expect(warmup.isReady()).toBe(false);
  });

  it('cancels a pending wait between attempts', async () => {
    const warmup = new Warmup({ enabled: true, maxAttempts: 10, intervalMs: 60_000 }, asLogger(log));
    const request = vi.fn(async () => false);

    const running = warmup.run(request);
    await vi.waitFor(() => {
      expect(request).toHaveBeenCalledTimes(1);
    });
    warmup.cancel();

    await expect(running).resolves.toEqual({ status: 'cancelled', attempts: 1 });
  });
});
