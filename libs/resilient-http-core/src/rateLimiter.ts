import type { RateLimiter } from './types';

/**
 * Spaces calls at least `1000 / maxPerSecond` ms apart. Slots are reserved
 * synchronously so concurrent callers sharing one limiter queue up in order.
 */
export class IntervalRateLimiter implements RateLimiter {
  private readonly minIntervalMs: number;
  private nextSlot = 0;

  constructor(
    private readonly maxPerSecond: number,
    private readonly now: () => number = () => Date.now(),
  ) {
    if (!(maxPerSecond > 0)) {
      throw new Error('maxPerSecond must be > 0');
    }
    this.minIntervalMs = 1000 / maxPerSecond;
  }

  get requestsPerSecond(): number {
    return this.maxPerSecond;
  }

  async throttle(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    const waitMs = slot - now;
    if (waitMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, waitMs));
    }
  }
}

export class NoopRateLimiter implements RateLimiter {
  async throttle(): Promise<void> {
    // no-op
  }
}

/**
 * A non-positive rate disables throttling.
 */
export function createRateLimiter(requestsPerSecond: number): RateLimiter {
  return requestsPerSecond > 0 ? new IntervalRateLimiter(requestsPerSecond) : new NoopRateLimiter();
}
