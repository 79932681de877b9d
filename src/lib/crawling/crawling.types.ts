/**
 * Crawling Types
 * Type definitions for the URL frontier and crawl statistics
 */

/**
 * What a task's URL is expected to hold, which decides how its page is traversed
 */
export enum TaskKind {
  TOC = 'toc',
  CONTENT_PAGE = 'content_page',
  PDF_DOCUMENT = 'pdf_document',
}

/**
 * Lifecycle of a frontier task
 */
export enum TaskStatus {
  PENDING = 'pending',
  IN_FLIGHT = 'in_flight',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  SKIPPED = 'skipped',
}

/**
 * Why enqueue() accepted or rejected a URL
 */
export enum EnqueueOutcome {
  QUEUED = 'queued',
  DUPLICATE = 'duplicate',
  DEPTH_EXCEEDED = 'depth_exceeded',
  HOST_NOT_ALLOWED = 'host_not_allowed',
  INVALID_URL = 'invalid_url',
}

export enum StopReason {
  MAX_PAGES = 'max_pages',
  OPERATOR = 'operator',
}

/**
 * Index of a task record inside the frontier
 */
export type TaskHandle = number;

/**
 * Unit of crawl work
 */
export interface UrlTask {
  /**
   * Frontier handle
   */
  handle: TaskHandle;

  /**
   * Normalized absolute URL
   */
  url: string;

  /**
   * Lowercase host of the URL
   */
  host: string;

  /**
   * Crawl depth (0 = seed)
   */
  depth: number;

  kind: TaskKind;

  /**
   * Parent URL (where this link was discovered)
   */
  parentUrl?: string;

  /**
   * When this task was discovered
   */
  discoveredAt: Date;
}

/**
 * Task as offered to the frontier
 */
export interface NewTask {
  url: string;
  depth: number;
  kind: TaskKind;
  parentUrl?: string;
}

export interface EnqueueResult {
  outcome: EnqueueOutcome;
  handle?: TaskHandle;
  url?: string; // Normalized form, when the URL parsed
}

/**
 * Frontier configuration
 */
export interface FrontierConfig {
  depthLimit: number;       // Maximum task depth
  maxPages: number;         // Maximum tasks dispatched in one run
  allowedHosts: string[];   // Empty admits every host
}

/**
 * Source of per-host wait estimates used to order dequeues
 */
export interface HostScheduler {
  estimateWait(host: string): number;
}

/**
 * Pending task as persisted for resume
 */
export interface PendingTaskState {
  url: string;
  depth: number;
  kind: TaskKind;
  parentUrl?: string;
}

/**
 * Persisted frontier state
 */
export interface FrontierSnapshot {
  version: 1;
  savedAt: string;
  completed: string[];
  pending: PendingTaskState[];
}

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  /**
   * Number of pages fetched successfully
   */
  pagesFetched: number;

  /**
   * Number of pages that produced no usable text
   */
  pagesSkipped: number;

  /**
   * Number of fetches that failed after retries
   */
  transientFailures: number;

  /**
   * Number of fetches that failed without retry
   */
  permanentFailures: number;

  /**
   * Number of fetched bodies that could not be parsed
   */
  parseErrors: number;

  /**
   * Number of links discovered
   */
  linksDiscovered: number;

  /**
   * Links dropped as outside configured years or hosts
   */
  linksFiltered: number;

  /**
   * Links dropped by the depth limit
   */
  depthLimited: number;

  /**
   * Candidates folded into an existing document
   */
  duplicatesDetected: number;

  /**
   * Retries beyond the first attempt, summed over all fetches
   */
  retries: number;

  bytesDownloaded: number;

  /**
   * Maximum depth reached
   */
  depthReached: number;

  /**
   * Total crawling time in milliseconds
   */
  totalTime: number;

  /**
   * Average time per fetched page in milliseconds
   */
  averagePageTime: number;

  /**
   * Success rate (0-1)
   */
  successRate: number;
}
