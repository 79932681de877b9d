/**
 * Fetch Error Handling
 * Failure classification and retry delay calculation
 */

import { TransportError } from './http-transport';
import { FetchError, FetchErrorType, RetryPolicy } from './fetch.types';

/**
 * Classify a thrown transport error
 */
export function classifyError(error: unknown): FetchError {
  if (error instanceof TransportError) {
    switch (error.kind) {
      case 'timeout':
        return {
          type: FetchErrorType.TIMEOUT,
          message: `Request timed out (${error.message})`,
          retryable: true,
        };
      case 'network':
        return {
          type: FetchErrorType.NETWORK_ERROR,
          message: `Network connection failed (${error.message})`,
          retryable: true,
        };
    }
  }

  const message = error instanceof Error ? error.message : String(error);

  // new URL() and fetch() both reject unusable URLs with a TypeError
  if (error instanceof TypeError && /invalid url/i.test(message)) {
    return {
      type: FetchErrorType.INVALID_URL,
      message: 'Malformed URL',
      retryable: false,
    };
  }

  return {
    type: FetchErrorType.UNKNOWN,
    message: message || 'Unknown error',
    retryable: true,
  };
}

/**
 * Classify an HTTP status. Null for success.
 */
export function classifyStatus(statusCode: number, retryAfter?: number): FetchError | null {
  if (statusCode >= 200 && statusCode < 300) {
    return null;
  }

  // Rate limited
  if (statusCode === 429) {
    return {
      type: FetchErrorType.RATE_LIMITED,
      message: 'Rate limited by server',
      statusCode,
      retryable: true,
      retryAfter,
    };
  }

  // Server errors
  if (statusCode >= 500) {
    return {
      type: FetchErrorType.SERVER_ERROR,
      message: `Server error (HTTP ${statusCode})`,
      statusCode,
      retryable: true,
      retryAfter,
    };
  }

  // Not found
  if (statusCode === 404 || statusCode === 410) {
    return {
      type: FetchErrorType.NOT_FOUND,
      message: 'Page not found',
      statusCode,
      retryable: false,
    };
  }

  return {
    type: FetchErrorType.CLIENT_ERROR,
    message: `Request rejected (HTTP ${statusCode})`,
    statusCode,
    retryable: false,
  };
}

/**
 * Determine if we should retry after `attemptCount` attempts
 */
export function shouldRetry(error: FetchError, attemptCount: number, maxRetries: number): boolean {
  if (attemptCount > maxRetries) return false;
  return error.retryable;
}

/**
 * Calculate retry delay with exponential backoff.
 * `retryIndex` is 0 for the first retry.
 */
export function calculateRetryDelay(
  error: FetchError,
  retryIndex: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  let delay = Math.min(policy.baseDelayMs * Math.pow(2, retryIndex), policy.maxDelayMs);

  // Honor a server-suggested delay, within the cap
  if (error.retryAfter !== undefined) {
    delay = Math.min(Math.max(delay, error.retryAfter), policy.maxDelayMs);
  }

  return delay + Math.floor(random() * policy.jitterMs);
}
