import { logger } from './logger.js';

export interface RetryOptions {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Uniform value in [min, max]. */
export function randomBetween(min: number, max: number, random: () => number = Math.random): number {
  return min + random() * (max - min);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    minDelayMs = 1000,
    maxDelayMs = 3000,
    shouldRetry = () => true,
    sleep: wait = sleep,
    random = Math.random,
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      const delay = randomBetween(minDelayMs, maxDelayMs, random);

      logger.debug(
        { attempt, maxAttempts, delayMs: Math.round(delay), error: String(error) },
        'Retrying after error',
      );

      await wait(delay);
    }
  }

  throw lastError;
}
