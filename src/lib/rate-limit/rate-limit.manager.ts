/**
 * Rate Limit Manager
 * Per-host token bucket pacing with per-host and global concurrency caps
 */

import { AdmissionAbortedError } from '../errors';
import { Clock, systemClock } from './clock';
import { TokenBucket } from './token-bucket';
import {
  AdmissionDecision,
  HostLimitStats,
  HostRateLimitConfig,
  Permit,
  RateLimitStats,
} from './rate-limit.types';

interface Waiter {
  seq: number;
  resolve: (permit: Permit) => void;
  detach?: () => void;
}

interface HostState {
  host: string;
  bucket: TokenBucket;
  active: number;
  waiters: Waiter[]; // FIFO
}

export class RateLimitManager {
  private hosts: Map<string, HostState> = new Map();
  private activeGlobal: number = 0;
  private nextSeq: number = 0;
  private wakeAt: number | null = null;
  private readonly burst: number;
  private stats = {
    totalAdmissions: 0,
    delayedAdmissions: 0,
  };

  constructor(
    private readonly config: HostRateLimitConfig,
    private readonly clock: Clock = systemClock
  ) {
    if (!(config.perHostConcurrency >= 1) || !(config.globalConcurrency >= 1)) {
      throw new RangeError('Concurrency limits must be at least 1');
    }
    this.burst = Math.max(1, config.burst ?? 1);
  }

  /**
   * Grant a permit now, or report how long the caller would wait
   */
  tryAdmit(host: string): AdmissionDecision {
    const state = this.getHostState(host);
    if (state.waiters.length === 0 && this.hasCapacity(state) && state.bucket.tryTake()) {
      return { granted: true, permit: this.grant(state) };
    }
    return { granted: false, waitMs: this.estimateWait(host) };
  }

  /**
   * Wait for a permit. Waiters on the same host are served in arrival order.
   */
  admit(host: string, signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) {
      return Promise.reject(new AdmissionAbortedError(host));
    }

    const decision = this.tryAdmit(host);
    if (decision.granted) {
      return Promise.resolve(decision.permit);
    }

    const state = this.getHostState(host);
    this.stats.delayedAdmissions++;

    return new Promise<Permit>((resolve, reject) => {
      const waiter: Waiter = { seq: this.nextSeq++, resolve };

      if (signal) {
        const onAbort = () => {
          const index = state.waiters.indexOf(waiter);
          if (index >= 0) {
            state.waiters.splice(index, 1);
            reject(new AdmissionAbortedError(host));
            this.pump();
          }
        };
        signal.addEventListener('abort', onAbort, { once: true });
        waiter.detach = () => signal.removeEventListener('abort', onAbort);
      }

      state.waiters.push(waiter);
      this.pump();
    });
  }

  /**
   * Milliseconds until a new request for the host could start.
   * Infinity when the host or the whole pool is at its concurrency cap.
   */
  estimateWait(host: string): number {
    const state = this.getHostState(host);
    if (!this.hasCapacity(state)) {
      return Number.POSITIVE_INFINITY;
    }
    return state.bucket.msUntilAvailable(state.waiters.length + 1);
  }

  /**
   * Get rate limit statistics
   */
  getStats(): RateLimitStats {
    const hosts: HostLimitStats[] = Array.from(this.hosts.values()).map((state) => ({
      host: state.host,
      active: state.active,
      waiting: state.waiters.length,
      tokens: state.bucket.available(),
    }));

    return {
      totalAdmissions: this.stats.totalAdmissions,
      delayedAdmissions: this.stats.delayedAdmissions,
      activeGlobal: this.activeGlobal,
      hosts,
    };
  }

  private getHostState(host: string): HostState {
    const key = host.toLowerCase();
    let state = this.hosts.get(key);
    if (!state) {
      state = {
        host: key,
        bucket: new TokenBucket(this.config.perHostRps, this.burst, this.clock),
        active: 0,
        waiters: [],
      };
      this.hosts.set(key, state);
    }
    return state;
  }

  private hasCapacity(state: HostState): boolean {
    return (
      this.activeGlobal < this.config.globalConcurrency &&
      state.active < this.config.perHostConcurrency
    );
  }

  private grant(state: HostState): Permit {
    state.active++;
    this.activeGlobal++;
    this.stats.totalAdmissions++;

    let released = false;
    return {
      host: state.host,
      grantedAt: this.clock.now(),
      release: () => {
        if (released) return;
        released = true;
        state.active--;
        this.activeGlobal--;
        this.pump();
      },
    };
  }

  /**
   * Hand out permits to waiting hosts, oldest head waiter first
   */
  private pump(): void {
    for (;;) {
      let next: HostState | null = null;
      for (const state of this.hosts.values()) {
        if (state.waiters.length === 0 || !this.hasCapacity(state)) continue;
        if (state.bucket.msUntilAvailable() > 0) continue;
        if (!next || state.waiters[0].seq < next.waiters[0].seq) {
          next = state;
        }
      }
      if (!next || !next.bucket.tryTake()) break;

      const waiter = next.waiters.shift();
      if (!waiter) break;
      waiter.detach?.();
      waiter.resolve(this.grant(next));
    }

    this.scheduleWake();
  }

  /**
   * Arrange a pump for when the earliest token-starved host refills.
   * Hosts blocked on concurrency are woken by release() instead.
   */
  private scheduleWake(): void {
    let delay = Number.POSITIVE_INFINITY;
    for (const state of this.hosts.values()) {
      if (state.waiters.length === 0 || !this.hasCapacity(state)) continue;
      delay = Math.min(delay, state.bucket.msUntilAvailable());
    }
    if (!Number.isFinite(delay)) return;

    const target = this.clock.now() + delay;
    if (this.wakeAt !== null && this.wakeAt <= target) return;

    this.wakeAt = target;
    void this.clock.sleep(delay).then(() => {
      if (this.wakeAt === target) {
        this.wakeAt = null;
      }
      this.pump();
    });
  }
}
