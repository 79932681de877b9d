/**
 * Crawl Engine
 * Worker pool driving frontier tasks through fetch, parse, transition and dedup.
 *
 * Each task moves PENDING -> IN_FLIGHT -> SUCCEEDED | FAILED | SKIPPED. Which
 * links are followed and which text is kept is decided by the site profile's
 * transition for the task kind; the engine only does the bookkeeping.
 */

import { env } from '../../config/env';
import {
  CrawlingStatistics,
  CrawlingStatisticsTracker,
  EnqueueOutcome,
  Frontier,
  StopReason,
  TaskStatus,
  UrlTask,
  urlPath,
} from '../../lib/crawling';
import { CanonicalDocument, DedupResolver, ResolveAction, rawContentHash } from '../../lib/dedup';
import { ParseError, StorageError } from '../../lib/errors';
import { FetchErrorType, FetchFailed, FetchOk, FetchOptions, FetchResult, FetchStatus } from '../../lib/fetching';
import { DocumentFormat, ParseInput, ParsedPage, detectFormat } from '../../lib/parsing';
import { RawContentStore } from '../indexing';
import { SiteProfile, SiteScope, TransitionResult } from './traversal.types';

export interface PageFetcher {
  fetch(task: UrlTask, options?: FetchOptions): Promise<FetchResult>;
}

export interface PageParser {
  parse(input: ParseInput): Promise<ParsedPage>;
}

export interface CrawlEngineDependencies {
  frontier: Frontier;
  fetcher: PageFetcher;
  parser: PageParser;
  resolver: DedupResolver;
  profile: SiteProfile;
  rawStore?: RawContentStore;
  statistics?: CrawlingStatisticsTracker;
  now?: () => Date;
}

export interface CrawlEngineOptions {
  concurrency: number;
  depthLimit: number;
  minTextChars: number;
  scope: SiteScope;
  progressEvery?: number; // Completed tasks between progress lines (default 10)
}

export interface CrawlFailure {
  url: string;
  reason: FetchErrorType | 'PARSE_ERROR';
  message: string;
  attemptCount: number;
}

export interface CrawlSummary {
  statistics: CrawlingStatistics;
  stopReason: StopReason | null;
  documents: CanonicalDocument[];
  failures: CrawlFailure[];
  skipped: string[];
}

export class CrawlEngine {
  private readonly statistics: CrawlingStatisticsTracker;
  private readonly now: () => Date;
  private readonly progressEvery: number;
  private abortController = new AbortController();
  private stopRequested: boolean = false;
  private running: boolean = false;
  private processed: number = 0;
  private failures: CrawlFailure[] = [];
  private skipped: string[] = [];

  constructor(
    private readonly deps: CrawlEngineDependencies,
    private readonly options: CrawlEngineOptions
  ) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError('concurrency must be a positive integer');
    }
    this.statistics = deps.statistics ?? new CrawlingStatisticsTracker();
    this.now = deps.now ?? (() => new Date());
    this.progressEvery = options.progressEvery ?? 10;
  }

  /**
   * Enqueue start URLs at depth 0. Returns how many were new.
   */
  seed(urls: string[]): number {
    let queued = 0;
    for (const url of urls) {
      const result = this.deps.frontier.enqueue({ url, depth: 0, kind: this.deps.profile.classify(url) });
      if (result.outcome === EnqueueOutcome.QUEUED) {
        queued++;
      } else if (result.outcome !== EnqueueOutcome.DUPLICATE) {
        console.warn(`⚠️  Seed ${url} not queued: ${result.outcome}`);
      }
    }
    return queued;
  }

  /**
   * Process tasks until the frontier is exhausted or stopped
   */
  async run(): Promise<CrawlSummary> {
    if (this.running) {
      throw new Error('Crawl is already running');
    }
    this.running = true;

    try {
      const workers = Array.from({ length: this.options.concurrency }, () => this.worker());
      await Promise.all(workers);
    } finally {
      this.running = false;
    }

    return this.getSummary();
  }

  /**
   * Stop dispatching. Admission waits are cancelled; fetches already on the
   * wire finish, but are not retried.
   */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.abortController.abort();
    this.deps.frontier.stop(StopReason.OPERATOR);
    console.log('🛑 Stop requested, finishing pages in flight...');
  }

  getSummary(): CrawlSummary {
    return {
      statistics: this.statistics.getStatistics(),
      stopReason: this.deps.frontier.getStopReason(),
      documents: this.deps.resolver.documents(),
      failures: [...this.failures],
      skipped: [...this.skipped],
    };
  }

  private async worker(): Promise<void> {
    const { frontier } = this.deps;
    for (;;) {
      const task = frontier.dequeue();
      if (task) {
        await this.process(task);
        continue;
      }
      if (frontier.isFinished()) {
        return;
      }
      await frontier.waitForChange();
    }
  }

  private async process(task: UrlTask): Promise<void> {
    try {
      const result = await this.deps.fetcher.fetch(task, {
        isStopped: () => this.stopRequested,
        signal: this.abortController.signal,
      });

      if (result.status === FetchStatus.OK) {
        await this.handlePage(result);
      } else {
        this.handleFailure(result);
      }
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`❌ Unexpected error processing ${task.url}:`, error);
      this.failures.push({ url: task.url, reason: FetchErrorType.UNKNOWN, message, attemptCount: 0 });
      this.finish(task, TaskStatus.FAILED);
    }
  }

  private handleFailure(result: FetchFailed): void {
    const { task, error } = result;
    if (error.type === FetchErrorType.ABORTED) {
      this.deps.frontier.requeue(task.handle);
      return;
    }

    const transient = result.status === FetchStatus.TRANSIENT_ERROR;
    this.statistics.recordFailed(transient, result.attemptCount);
    console.warn(`⚠️  ${transient ? 'Gave up on' : 'Failed'} ${task.url}: ${error.message}`);
    this.failures.push({ url: task.url, reason: error.type, message: error.message, attemptCount: result.attemptCount });
    this.finish(task, TaskStatus.FAILED);
  }

  private async handlePage(result: FetchOk): Promise<void> {
    const { task } = result;
    this.statistics.recordPageFetched(task.depth, result.elapsedMs, result.body.length, result.attemptCount);

    const format = detectFormat(result.contentType, result.body);
    const savedPath = format ? await this.saveRaw(task.url, result.body, format) : null;

    let page: ParsedPage;
    try {
      page = await this.deps.parser.parse({
        url: task.url,
        finalUrl: result.finalUrl,
        contentType: result.contentType,
        body: result.body,
      });
    } catch (error: unknown) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      this.statistics.recordParseError();
      console.warn(`⚠️  ${error.message}`);
      this.failures.push({ url: task.url, reason: 'PARSE_ERROR', message: error.message, attemptCount: result.attemptCount });
      this.finish(task, TaskStatus.FAILED);
      return;
    }

    const transition = this.deps.profile.transitions[task.kind];
    const outcome = transition({
      task,
      page,
      scope: this.options.scope,
      depthLimit: this.options.depthLimit,
      minTextChars: this.options.minTextChars,
      fetchedAt: this.now(),
      rawContentHash: rawContentHash(result.body),
      sourcePath: savedPath ?? urlPath(task.url),
    });

    if (outcome.skip) {
      this.statistics.recordSkipped();
      this.skipped.push(task.url);
      if (env.VERBOSE) {
        console.debug(outcome.skip.message);
      }
      this.finish(task, TaskStatus.SKIPPED);
      return;
    }

    this.enqueueDiscovered(outcome);

    for (const candidate of outcome.candidates) {
      const { action } = this.deps.resolver.resolve(candidate);
      if (action === ResolveAction.ALIASED) {
        this.statistics.recordDuplicate();
      }
    }

    if (env.VERBOSE) {
      console.debug(`Processed ${task.url}: ${outcome.candidates.length} document(s), ${outcome.next.length} link(s)`);
    }
    this.finish(task, TaskStatus.SUCCEEDED);
  }

  private enqueueDiscovered(outcome: TransitionResult): void {
    this.statistics.recordLinkDiscovery(outcome.next.length + outcome.filtered.length + outcome.depthLimited.length);
    this.statistics.recordFiltered(outcome.filtered.length);
    this.statistics.recordDepthLimited(outcome.depthLimited.length);

    for (const next of outcome.next) {
      const { outcome: enqueued } = this.deps.frontier.enqueue(next);
      if (enqueued === EnqueueOutcome.DEPTH_EXCEEDED) {
        this.statistics.recordDepthLimited(1);
      } else if (enqueued === EnqueueOutcome.HOST_NOT_ALLOWED) {
        this.statistics.recordFiltered(1);
      }
    }
  }

  /**
   * Keep the raw body; a failed write is logged and the page still processed
   */
  private async saveRaw(url: string, body: Buffer, format: DocumentFormat): Promise<string | null> {
    if (!this.deps.rawStore) {
      return null;
    }
    try {
      return await this.deps.rawStore.save(url, body, format);
    } catch (error: unknown) {
      if (error instanceof StorageError) {
        console.warn(`⚠️  ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  private finish(task: UrlTask, status: TaskStatus.SUCCEEDED | TaskStatus.FAILED | TaskStatus.SKIPPED): void {
    this.deps.frontier.complete(task.handle, status);
    this.processed++;

    if (this.processed % this.progressEvery === 0) {
      const { frontier, resolver } = this.deps;
      console.log(
        `📊 Progress: ${this.processed} processed, ${frontier.size()} queued, ` +
          `${frontier.inFlightCount()} in flight, ${resolver.size()} documents`
      );
    }
  }
}
