/**
 * Crawling Statistics Tracker
 * Track crawl outcomes for progress lines and the final summary
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesFetched: number = 0;
  private pagesSkipped: number = 0;
  private transientFailures: number = 0;
  private permanentFailures: number = 0;
  private parseErrors: number = 0;
  private linksDiscovered: number = 0;
  private linksFiltered: number = 0;
  private depthLimited: number = 0;
  private duplicatesDetected: number = 0;
  private retries: number = 0;
  private bytesDownloaded: number = 0;
  private maxDepthReached: number = 0;
  private pageTimes: number[] = [];

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  /**
   * Record a successful fetch
   */
  recordPageFetched(depth: number, time: number, bytes: number, attemptCount: number): void {
    this.pagesFetched++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    this.pageTimes.push(time);
    this.bytesDownloaded += bytes;
    this.recordRetries(attemptCount);
  }

  /**
   * Record a fetch that failed, transient after exhausting retries or permanent
   */
  recordFailed(transient: boolean, attemptCount: number): void {
    if (transient) {
      this.transientFailures++;
    } else {
      this.permanentFailures++;
    }
    this.recordRetries(attemptCount);
  }

  /**
   * Record a page skipped by the quality filter
   */
  recordSkipped(): void {
    this.pagesSkipped++;
  }

  recordParseError(): void {
    this.parseErrors++;
  }

  /**
   * Record link discovery
   */
  recordLinkDiscovery(count: number): void {
    this.linksDiscovered += count;
  }

  /**
   * Record links dropped as out of scope
   */
  recordFiltered(count: number): void {
    this.linksFiltered += count;
  }

  recordDepthLimited(count: number): void {
    this.depthLimited += count;
  }

  /**
   * Record duplicate detection
   */
  recordDuplicate(): void {
    this.duplicatesDetected++;
  }

  /**
   * Tasks that reached a final outcome
   */
  completedCount(): number {
    return (
      this.pagesFetched +
      this.transientFailures +
      this.permanentFailures
    );
  }

  /**
   * Get final statistics
   */
  getStatistics(): CrawlingStatistics {
    const totalTime = this.now() - this.startTime;
    const averagePageTime =
      this.pageTimes.length > 0
        ? this.pageTimes.reduce((sum, time) => sum + time, 0) / this.pageTimes.length
        : 0;

    const totalAttempts = this.completedCount();
    const successRate = totalAttempts > 0 ? this.pagesFetched / totalAttempts : 0;

    return {
      pagesFetched: this.pagesFetched,
      pagesSkipped: this.pagesSkipped,
      transientFailures: this.transientFailures,
      permanentFailures: this.permanentFailures,
      parseErrors: this.parseErrors,
      linksDiscovered: this.linksDiscovered,
      linksFiltered: this.linksFiltered,
      depthLimited: this.depthLimited,
      duplicatesDetected: this.duplicatesDetected,
      retries: this.retries,
      bytesDownloaded: this.bytesDownloaded,
      depthReached: this.maxDepthReached,
      totalTime,
      averagePageTime: Math.round(averagePageTime),
      successRate: Math.round(successRate * 100) / 100,
    };
  }

  private recordRetries(attemptCount: number): void {
    this.retries += Math.max(0, attemptCount - 1);
  }
}
