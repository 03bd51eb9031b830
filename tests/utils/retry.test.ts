import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { retry, withTimeout, TimeoutError } from '../../src/utils/retry.js';

describe('retry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return the first successful result without waiting', async () => {
    const fn = vi.fn(async () => 'ok');
    await expect(retry(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should back off 2s then 4s between three attempts', async () => {
    const delays: number[] = [];
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`fail ${attempt}`);
      return 'third time';
    });

    const promise = retry(fn, { onRetry: (_attempt, _err, delayMs) => delays.push(delayMs) });
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toBe('third time');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([2000, 4000]);
  });

  it('should cap each delay at maxDelayMs', async () => {
    const delays: number[] = [];
    const fn = vi.fn(async () => {
      throw new Error('down');
    });

    const promise = retry(fn, {
      maxAttempts: 5,
      onRetry: (_attempt, _err, delayMs) => delays.push(delayMs),
    });
    const assertion = expect(promise).rejects.toThrow('down');
    await vi.runAllTimersAsync();
    await assertion;

    expect(delays).toEqual([2000, 4000, 8000, 10_000]);
  });

  it('should rethrow the last error after the final attempt', async () => {
    let n = 0;
    const fn = async () => {
      n++;
      throw new Error(`attempt ${n}`);
    };

    const promise = retry(fn);
    const assertion = expect(promise).rejects.toThrow('attempt 3');
    await vi.runAllTimersAsync();
    await assertion;
  });

  it('should stop early when shouldRetry returns false', async () => {
    const fn = vi.fn(async () => {
      throw new Error('bad request');
    });

    await expect(retry(fn, { shouldRetry: () => false })).rejects.toThrow('bad request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should wrap non-Error rejections', async () => {
    const promise = retry(() => Promise.reject('plain'), { maxAttempts: 1 });
    await expect(promise).rejects.toThrow('Retry exhausted: plain');
  });
});

describe('withTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve when the promise settles first', async () => {
    await expect(withTimeout(Promise.resolve(7), 1000)).resolves.toBe(7);
  });

  it('should reject with TimeoutError when the deadline passes', async () => {
    const never = new Promise<number>(() => undefined);
    const promise = withTimeout(never, 500, 'Generation');
    const assertion = expect(promise).rejects.toBeInstanceOf(TimeoutError);
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    await expect(promise).rejects.toThrow('Generation timed out after 500ms');
  });
});
