import type { RateLimitConfig } from '../types/connection.js';
import { RateLimitError } from './errorHandler.js';
import { sleep } from './abort.js';

/**
 * Token bucket limiter shared by every call to one org.
 *
 * The bucket holds up to `burstSize` permits and refills continuously at
 * `requestsPerSecond`. Refill and take happen in one synchronous step, so
 * concurrent callers can never draw the bucket below zero.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly now: () => number;

  constructor(public readonly config: RateLimitConfig, now: () => number = Date.now) {
    if (!(config.requestsPerSecond > 0)) {
      throw new RangeError(`requestsPerSecond must be > 0, got ${config.requestsPerSecond}`);
    }
    if (!Number.isInteger(config.burstSize) || config.burstSize < 1) {
      throw new RangeError(`burstSize must be an integer >= 1, got ${config.burstSize}`);
    }
    this.now = now;
    this.tokens = config.burstSize;
    this.lastRefill = now();
  }

  /** Permits currently in the bucket, after refill */
  get available(): number {
    this.refill();
    return this.tokens;
  }

  /**
   * Take a permit if one is available right now
   */
  tryAcquire(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Take a permit, waiting for the refill when `waitOnLimit` is set.
   * The wait is bounded only by the caller's signal.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (this.tryAcquire()) {
        return;
      }
      const waitMs = this.msUntilNextPermit();
      if (!this.config.waitOnLimit) {
        throw new RateLimitError(
          `Rate limit of ${this.config.requestsPerSecond} req/s exceeded`,
          'bucket_exhausted',
          waitMs
        );
      }
      await sleep(waitMs, signal);
    }
  }

  private msUntilNextPermit(): number {
    return Math.ceil(((1 - this.tokens) / this.config.requestsPerSecond) * 1000);
  }

  private refill(): void {
    const now = this.now();
    const elapsedMs = Math.max(0, now - this.lastRefill);
    this.lastRefill = now;
    this.tokens = Math.min(
      this.config.burstSize,
      this.tokens + (elapsedMs / 1000) * this.config.requestsPerSecond
    );
  }
}
