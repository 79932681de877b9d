/**
 * Token Bucket
 * Time-based refill bucket backing per-host request pacing
 */

import { Clock } from './clock';

// Absorbs floating point drift in refill arithmetic
const EPSILON = 1e-9;

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private readonly ratePerSecond: number,
    private readonly capacity: number,
    private readonly clock: Clock
  ) {
    if (!(ratePerSecond > 0)) {
      throw new RangeError(`Token bucket rate must be positive, got ${ratePerSecond}`);
    }
    if (!(capacity >= 1)) {
      throw new RangeError(`Token bucket capacity must be at least 1, got ${capacity}`);
    }
    this.tokens = capacity;
    this.lastRefill = clock.now();
  }

  /**
   * Tokens currently available (fractional)
   */
  available(): number {
    this.refill();
    return this.tokens;
  }

  /**
   * Take one token if available
   */
  tryTake(): boolean {
    this.refill();
    if (this.tokens + EPSILON < 1) {
      return false;
    }
    this.tokens = Math.max(0, this.tokens - 1);
    return true;
  }

  /**
   * Milliseconds until `count` tokens will be available
   */
  msUntilAvailable(count: number = 1): number {
    this.refill();
    const deficit = count - this.tokens;
    if (deficit <= EPSILON) {
      return 0;
    }
    return Math.ceil((deficit * 1000) / this.ratePerSecond);
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.ratePerSecond) / 1000);
      this.lastRefill = now;
    }
  }
}
