/**
 * Token Bucket Tests
 */

import { TokenBucket } from '../token-bucket';
import { FakeClock } from '../../../__tests__/helpers/mocks';

describe('TokenBucket', () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
  });

  it('should start full', () => {
    const bucket = new TokenBucket(2, 3, clock);
    expect(bucket.available()).toBe(3);
  });

  it('should refuse a token until the refill interval has passed', async () => {
    const bucket = new TokenBucket(2, 1, clock);

    expect(bucket.tryTake()).toBe(true);
    expect(bucket.tryTake()).toBe(false);
    expect(bucket.msUntilAvailable()).toBe(500);

    await clock.advance(250);
    expect(bucket.available()).toBeCloseTo(0.5);
    expect(bucket.msUntilAvailable()).toBe(250);

    await clock.advance(250);
    expect(bucket.tryTake()).toBe(true);
  });

  it('should never hold more than its capacity', async () => {
    const bucket = new TokenBucket(10, 2, clock);
    await clock.advance(60000);
    expect(bucket.available()).toBe(2);
  });

  it('should report waits for several tokens', () => {
    const bucket = new TokenBucket(4, 1, clock);
    bucket.tryTake();
    expect(bucket.msUntilAvailable(2)).toBe(500);
  });

  it('should reject invalid settings', () => {
    expect(() => new TokenBucket(0, 1, clock)).toThrow(RangeError);
    expect(() => new TokenBucket(1, 0, clock)).toThrow(RangeError);
  });
});
