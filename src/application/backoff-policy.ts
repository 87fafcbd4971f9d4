export interface BackoffConfig {
  initialDelayMs: number;
  multiplier: number;
  /** Multiplicative jitter factor in [0, 1). Requires `multiplier >= 1 + jitter`. */
  jitter: number;
  maxDelayMs: number;
  /** Ceiling on the cumulative backoff spent on a single batch. */
  totalBackoffMs: number;
  /** 0 = bounded by `totalBackoffMs` only. */
  maxRetries: number;
  /** Fixes the jitter sequence; `undefined` uses Math.random. */
  seed?: number | undefined;
}

export interface BackoffPolicy {
  /** Delay before retry number `attempt` (starting at 1). */
  delay(attempt: number): number;
  /**
   * Whether waiting `delay(attempt)` after `elapsedMs` of backoff keeps the
   * batch within the retry ceiling.
   */
  shouldRetry(attempt: number, elapsedMs: number): boolean;
}

/**
 * Exponential backoff with multiplicative jitter.
 *
 * delay(n) = min(maxDelay, initial * multiplier^(n-1) * (1 + jitter * r))
 *
 * With a seed, `r` depends only on (seed, attempt), so the policy stays a
 * pure function of its input. Delays are non-decreasing as long as
 * `multiplier >= 1 + jitter`.
 */
export function createBackoffPolicy(config: BackoffConfig): BackoffPolicy {
  const sample = config.seed === undefined
    ? () => Math.random()
    : (attempt: number) => seededUnit(config.seed ?? 0, attempt);

  function delay(attempt: number): number {
    const n = Math.max(1, Math.floor(attempt));
    const base = config.initialDelayMs * Math.pow(config.multiplier, n - 1);
    const jittered = base * (1 + config.jitter * sample(n));
    return Math.round(Math.min(config.maxDelayMs, jittered));
  }

  function shouldRetry(attempt: number, elapsedMs: number): boolean {
    if (config.maxRetries > 0 && attempt > config.maxRetries) return false;
    return elapsedMs + delay(attempt) <= config.totalBackoffMs;
  }

  return { delay, shouldRetry };
}

/**
 * Deterministic value in [0, 1) from a seed and an attempt number
 * (mulberry32 over the mixed pair).
 */
export function seededUnit(seed: number, attempt: number): number {
  let t = (Math.imul(seed | 0, 0x9e3779b1) ^ Math.imul(attempt | 0, 0x85ebca6b)) >>> 0;
  t = (t + 0x6d2b79f5) >>> 0;
  let r = Math.imul(t ^ (t >>> 15), t | 1);
  r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
  return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
}
