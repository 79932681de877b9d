/**
 * Rate Limit Types
 * Type definitions for per-host politeness control
 */

/**
 * Host rate limit configuration
 */
export interface HostRateLimitConfig {
  perHostRps: number;          // Token refill rate per host (requests per second)
  perHostConcurrency: number;  // Maximum in-flight requests per host
  globalConcurrency: number;   // Maximum in-flight requests across all hosts
  burst?: number;              // Bucket capacity, 1 means no burst
}

/**
 * Right to issue one request to a host.
 * Must be released when the request ends.
 */
export interface Permit {
  readonly host: string;
  readonly grantedAt: number;
  release(): void;
}

/**
 * Result of a non-blocking admission attempt
 */
export type AdmissionDecision =
  | { granted: true; permit: Permit }
  | { granted: false; waitMs: number }; // Infinity when only a release can unblock

/**
 * Per-host limiter state snapshot
 */
export interface HostLimitStats {
  host: string;
  active: number;
  waiting: number;
  tokens: number;
}

/**
 * Rate limit statistics
 */
export interface RateLimitStats {
  totalAdmissions: number;     // Permits granted
  delayedAdmissions: number;   // Admissions that had to wait
  activeGlobal: number;        // Permits currently held
  hosts: HostLimitStats[];
}
