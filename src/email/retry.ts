/**
 * Retry With Exponential Backoff
 *
 * Runs an operation up to maxAttempts times. After failed attempt k
 * (0-based) it waits baseDelayMs * 2^k before trying again; there is no
 * wait after the final attempt.
 */

import type { RetryOptions } from './types.js';

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempt(s): ${reason}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/** Delay before the attempt that follows failed attempt `k` (0-based) */
export function backoffDelay(baseDelayMs: number, k: number): number {
  return baseDelayMs * 2 ** k;
}

/**
 * @param fn - Receives the 1-based attempt number
 * @throws RetryExhaustedError once every attempt has failed
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxAttempts, baseDelayMs, sleep, onRetry } = options;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }

  let lastError: unknown;
  for (let k = 0; k < maxAttempts; k++) {
    try {
      return await fn(k + 1);
    } catch (err) {
      lastError = err;
      if (k === maxAttempts - 1) break;

      const delayMs = backoffDelay(baseDelayMs, k);
      onRetry?.({ attempt: k + 1, delayMs, error: err });
      await sleep(delayMs);
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}
