/**
 * Waits `ms` milliseconds.
 *
 * Resolves `true` when the delay elapsed and `false` as soon as `signal`
 * aborts, so callers can tell a completed wait from a cancelled one
 * without exception handling.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise<boolean>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
