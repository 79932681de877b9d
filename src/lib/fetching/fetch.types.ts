/**
 * Fetch Types
 * Type definitions for the retrying HTTP fetch layer
 */

import { UrlTask } from '../crawling';

export enum FetchStatus {
  OK = 'ok',
  TRANSIENT_ERROR = 'transient_error',
  PERMANENT_ERROR = 'permanent_error',
}

export enum FetchErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',
  SERVER_ERROR = 'SERVER_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CLIENT_ERROR = 'CLIENT_ERROR',
  INVALID_URL = 'INVALID_URL',
  ROBOTS_DISALLOWED = 'ROBOTS_DISALLOWED',
  ABORTED = 'ABORTED',
  UNKNOWN = 'UNKNOWN',
}

export interface FetchError {
  type: FetchErrorType;
  message: string;
  statusCode?: number;
  retryable: boolean;
  retryAfter?: number; // milliseconds
}

/**
 * Per-attempt timeout budgets
 */
export interface TimeoutSettings {
  connectMs: number;   // Until response headers arrive
  readMs: number;      // Reading the body
  totalMs: number;     // Whole attempt
}

export interface RetryPolicy {
  maxRetries: number;     // Retries after the first attempt
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;       // Uniform jitter added to each delay
}

export interface FetchOk {
  status: FetchStatus.OK;
  task: UrlTask;
  httpStatus: number;
  contentType: string;
  body: Buffer;
  finalUrl: string;
  attemptCount: number;
  elapsedMs: number;
}

export interface FetchFailed {
  status: FetchStatus.TRANSIENT_ERROR | FetchStatus.PERMANENT_ERROR;
  task: UrlTask;
  error: FetchError;
  httpStatus?: number;
  attemptCount: number;
  elapsedMs: number;
}

export type FetchResult = FetchOk | FetchFailed;

// --- Transport ---

export type TimeoutPhase = 'connect' | 'read' | 'total';

export interface TransportRequest {
  url: string;
  headers: Record<string, string>;
  timeouts: TimeoutSettings;
}

export interface TransportResponse {
  status: number;
  url: string;           // Final URL after redirects
  contentType: string;
  body: Buffer;
  retryAfterMs?: number; // Parsed Retry-After header
}

/**
 * One HTTP GET, no retries
 */
export interface HttpTransport {
  request(request: TransportRequest): Promise<TransportResponse>;
}
