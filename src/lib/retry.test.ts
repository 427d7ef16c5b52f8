import { describe, it, expect, vi } from 'vitest';
import { withRetry, randomBetween } from './retry.js';

describe('randomBetween', () => {
  it('spans the range', () => {
    expect(randomBetween(1000, 3000, () => 0)).toBe(1000);
    expect(randomBetween(1000, 3000, () => 0.25)).toBe(1500);
    expect(randomBetween(1000, 3000, () => 1)).toBe(3000);
  });
});

describe('withRetry', () => {
  it('retries until the call succeeds', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`attempt ${attempt}`);
      return 'done';
    });

    await expect(withRetry(fn, { maxAttempts: 3, sleep, random: () => 0 })).resolves.toBe('done');
    expect(fn.mock.calls).toEqual([[1], [2], [3]]);
    expect(sleep.mock.calls).toEqual([[1000], [1000]]);
  });

  it('rethrows the last error without a final delay', async () => {
    const sleep = vi.fn(async (_ms: number) => {});

    await expect(
      withRetry(async (attempt) => { throw new Error(`attempt ${attempt}`); }, { maxAttempts: 2, sleep }),
    ).rejects.toThrow('attempt 2');
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('stops on errors that should not be retried', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn(async () => { throw new TypeError('fatal'); });

    await expect(withRetry(fn, { shouldRetry: error => !(error instanceof TypeError), sleep })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
