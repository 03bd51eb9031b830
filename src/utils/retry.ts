/**
 * Exponential backoff retry and timeout helpers for external calls.
 */

export interface RetryOptions {
  /** Maximum number of attempts, including the first. */
  maxAttempts?: number;
  /** Delay before the second attempt in milliseconds. */
  initialDelayMs?: number;
  /** Backoff multiplier applied after every failed attempt. */
  backoffFactor?: number;
  /** Upper bound for a single delay in milliseconds. */
  maxDelayMs?: number;
  /** Return false to stop retrying on errors that will not go away. */
  shouldRetry?: (err: unknown) => boolean;
  /** Called before sleeping ahead of the next attempt. */
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
}

const DEFAULTS = {
  maxAttempts: 3,
  initialDelayMs: 2000,
  backoffFactor: 2,
  maxDelayMs: 10_000,
};

/**
 * Run `fn` until it resolves or the attempts run out.
 * The last error is rethrown unchanged when every attempt fails.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {}
): Promise<T> {
  const config = { ...DEFAULTS, ...opts };
  let delay = config.initialDelayMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === config.maxAttempts) break;
      if (opts.shouldRetry && !opts.shouldRetry(err)) break;

      const wait = Math.min(delay, config.maxDelayMs);
      opts.onRetry?.(attempt, err, wait);
      await sleep(wait);
      delay = delay * config.backoffFactor;
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`Retry exhausted: ${String(lastError)}`);
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/** Reject with a TimeoutError if `promise` has not settled within `ms`. */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label = 'Operation'
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });

  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
