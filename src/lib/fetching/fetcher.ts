/**
 * HTTP Fetcher
 * Rate-limited GET with bounded retries, exponential backoff and jitter
 */

import { env } from '../../config/env';
import { UrlTask, isValidUrl } from '../crawling';
import { AdmissionAbortedError } from '../errors';
import { Clock, Permit, RateLimitManager, systemClock } from '../rate-limit';
import { calculateRetryDelay, classifyError, classifyStatus, shouldRetry } from './fetch.errors';
import { fetchTransport } from './http-transport';
import { RobotsPolicy } from './robots.policy';
import {
  FetchError,
  FetchErrorType,
  FetchFailed,
  FetchResult,
  FetchStatus,
  HttpTransport,
  RetryPolicy,
  TimeoutSettings,
  TransportResponse,
} from './fetch.types';

export interface FetcherConfig {
  userAgent: string;
  timeouts: TimeoutSettings;
  retry: RetryPolicy;
}

export interface FetcherDependencies {
  rateLimiter: RateLimitManager;
  transport?: HttpTransport;
  robots?: RobotsPolicy;
  clock?: Clock;
  random?: () => number;
}

export interface FetchOptions {
  /**
   * Checked before each retry; once true no further attempt is made
   */
  isStopped?: () => boolean;

  /**
   * Aborts a wait for rate-limiter admission
   */
  signal?: AbortSignal;
}

const ACCEPT_HEADER = 'text/html,application/xhtml+xml,application/pdf;q=0.9,*/*;q=0.8';

export class HttpFetcher {
  private readonly transport: HttpTransport;
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(
    private readonly config: FetcherConfig,
    private readonly deps: FetcherDependencies
  ) {
    this.transport = deps.transport ?? fetchTransport;
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
  }

  /**
   * Fetch a task's URL. Never rejects: every outcome is a tagged result.
   */
  async fetch(task: UrlTask, options: FetchOptions = {}): Promise<FetchResult> {
    const startedAt = this.clock.now();

    if (!isValidUrl(task.url)) {
      return this.failed(task, FetchStatus.PERMANENT_ERROR, {
        type: FetchErrorType.INVALID_URL,
        message: 'Malformed URL',
        retryable: false,
      }, 0, startedAt);
    }

    if (this.deps.robots && !(await this.deps.robots.isAllowed(task.url))) {
      return this.failed(task, FetchStatus.PERMANENT_ERROR, {
        type: FetchErrorType.ROBOTS_DISALLOWED,
        message: 'Disallowed by robots.txt',
        retryable: false,
      }, 0, startedAt);
    }

    let attemptCount = 0;
    for (;;) {
      let permit: Permit;
      try {
        permit = await this.deps.rateLimiter.admit(task.host, options.signal);
      } catch (error: unknown) {
        if (error instanceof AdmissionAbortedError) {
          return this.failed(task, FetchStatus.TRANSIENT_ERROR, {
            type: FetchErrorType.ABORTED,
            message: 'Stopped while waiting for admission',
            retryable: false,
          }, attemptCount, startedAt);
        }
        throw error;
      }

      attemptCount++;
      const attempt = await this.attempt(task, permit);
      if (attempt.ok) {
        return {
          status: FetchStatus.OK,
          task,
          httpStatus: attempt.response.status,
          contentType: attempt.response.contentType,
          body: attempt.response.body,
          finalUrl: attempt.response.url,
          attemptCount,
          elapsedMs: this.clock.now() - startedAt,
        };
      }

      const { error } = attempt;
      if (!error.retryable) {
        return this.failed(task, FetchStatus.PERMANENT_ERROR, error, attemptCount, startedAt);
      }
      if (!shouldRetry(error, attemptCount, this.config.retry.maxRetries) || options.isStopped?.()) {
        return this.failed(task, FetchStatus.TRANSIENT_ERROR, error, attemptCount, startedAt);
      }

      const delay = calculateRetryDelay(error, attemptCount - 1, this.config.retry, this.random);
      if (env.VERBOSE) {
        console.debug(`Fetch ${task.url}: attempt ${attemptCount} failed (${error.message}), retrying in ${delay}ms`);
      }
      await this.clock.sleep(delay);

      if (options.isStopped?.()) {
        return this.failed(task, FetchStatus.TRANSIENT_ERROR, error, attemptCount, startedAt);
      }
    }
  }

  /**
   * One request under a held permit; the permit is released when it ends
   */
  private async attempt(
    task: UrlTask,
    permit: Permit
  ): Promise<{ ok: true; response: TransportResponse } | { ok: false; error: FetchError }> {
    try {
      const response = await this.transport.request({
        url: task.url,
        headers: { 'User-Agent': this.config.userAgent, Accept: ACCEPT_HEADER },
        timeouts: this.config.timeouts,
      });
      const error = classifyStatus(response.status, response.retryAfterMs);
      return error ? { ok: false, error } : { ok: true, response };
    } catch (thrown: unknown) {
      return { ok: false, error: classifyError(thrown) };
    } finally {
      permit.release();
    }
  }

  private failed(
    task: UrlTask,
    status: FetchFailed['status'],
    error: FetchError,
    attemptCount: number,
    startedAt: number
  ): FetchFailed {
    return {
      status,
      task,
      error,
      httpStatus: error.statusCode,
      attemptCount,
      elapsedMs: this.clock.now() - startedAt,
    };
  }
}
