/**
 * Clock
 * Time source used by the rate limiter and retry backoff
 */

export interface Clock {
  /** Milliseconds since an arbitrary epoch; must never go backwards */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms))),
};
