import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, RetryExhaustedError, withRetry } from '../retry.js';
import { createFakeClock } from '../../__tests__/helpers.js';

describe('backoffDelay', () => {
  it('doubles the base delay per failed attempt', () => {
    expect([0, 1, 2, 3].map((k) => backoffDelay(1000, k))).toEqual([1000, 2000, 4000, 8000]);
  });
});

describe('withRetry', () => {
  it('returns the first successful result without waiting', async () => {
    const clock = createFakeClock();
    const fn = vi.fn().mockResolvedValue('ok');

    const result = await withRetry(fn, { maxAttempts: 5, baseDelayMs: 1000, sleep: clock.sleep });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('backs off exponentially between failed attempts', async () => {
    const clock = createFakeClock();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('third time');

    const result = await withRetry(fn, { maxAttempts: 5, baseDelayMs: 100, sleep: clock.sleep });

    expect(result).toBe('third time');
    expect(fn.mock.calls.map((call) => call[0])).toEqual([1, 2, 3]);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('gives up after maxAttempts without waiting after the last one', async () => {
    const clock = createFakeClock();
    const last = new Error('still down');
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('down'))
      .mockRejectedValueOnce(new Error('down'))
      .mockRejectedValueOnce(new Error('down'))
      .mockRejectedValueOnce(last);

    const attempt = withRetry(fn, { maxAttempts: 4, baseDelayMs: 1000, sleep: clock.sleep });

    await expect(attempt).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(attempt).rejects.toMatchObject({ attempts: 4, lastError: last });
    expect(fn).toHaveBeenCalledTimes(4);
    expect(clock.sleeps).toEqual([1000, 2000, 4000]);
  });

  it('reports each retry before sleeping', async () => {
    const clock = createFakeClock();
    const onRetry = vi.fn();
    const boom = new Error('boom');
    const fn = vi.fn().mockRejectedValueOnce(boom).mockResolvedValue(1);

    await withRetry(fn, { maxAttempts: 2, baseDelayMs: 50, sleep: clock.sleep, onRetry });

    expect(onRetry).toHaveBeenCalledWith({ attempt: 1, delayMs: 50, error: boom });
  });

  it('runs once with no retry when maxAttempts is 1', async () => {
    const clock = createFakeClock();
    const fn = vi.fn().mockRejectedValue(new Error('nope'));

    await expect(
      withRetry(fn, { maxAttempts: 1, baseDelayMs: 1000, sleep: clock.sleep }),
    ).rejects.toThrow('Gave up after 1 attempt(s): nope');
    expect(clock.sleeps).toEqual([]);
  });

  it('rejects an invalid attempt count', async () => {
    const clock = createFakeClock();
    await expect(
      withRetry(async () => 1, { maxAttempts: 0, baseDelayMs: 1, sleep: clock.sleep }),
    ).rejects.toBeInstanceOf(RangeError);
  });
});
