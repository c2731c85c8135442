/**
 * Sliding Window Rate Limiter
 *
 * Allows at most `limit` acquisitions in any rolling `windowMs` period.
 * A caller over the limit waits until the oldest acquisition leaves the
 * window; it is never rejected. Acquisitions are serialized, so concurrent
 * callers are admitted in call order.
 */

import type { Clock } from './types.js';

export class SlidingWindowRateLimiter {
  private readonly timestamps: number[] = [];
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly limit: number,
    private readonly windowMs: number,
    private readonly clock: Clock,
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Rate limit must be a positive integer, got ${limit}`);
    }
    if (windowMs <= 0) {
      throw new RangeError(`Rate window must be positive, got ${windowMs}`);
    }
  }

  /** Resolves once the caller may proceed; records the acquisition time */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot());
    // Keep the chain alive even if a sleep rejects
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  /** Acquisitions currently inside the window */
  inFlight(): number {
    this.prune(this.clock.now());
    return this.timestamps.length;
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      this.prune(now);

      if (this.timestamps.length < this.limit) {
        this.timestamps.push(now);
        return;
      }

      const oldest = this.timestamps[0];
      await this.clock.sleep(oldest + this.windowMs - now);
    }
  }

  private prune(now: number): void {
    while (this.timestamps.length > 0 && this.timestamps[0] <= now - this.windowMs) {
      this.timestamps.shift();
    }
  }
}
