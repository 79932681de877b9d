/**
 * Crawl Service
 * Builds a crawl from configuration: resume state, rate limiter, fetcher,
 * frontier and engine, then chunks the canonical documents and writes the
 * JSONL output and the frontier state.
 */

import { CrawlerConfig } from '../../config/crawler.config';
import { CrawlingStatisticsTracker, EnqueueOutcome, Frontier, FrontierStateStore, TaskKind } from '../../lib/crawling';
import { TextChunker } from '../../lib/chunking';
import { DedupResolver } from '../../lib/dedup';
import { HttpFetcher, HttpTransport, RobotsTxtPolicy, allowAllRobotsPolicy, fetchTransport } from '../../lib/fetching';
import { DocumentParser, PdfTextExtractor } from '../../lib/parsing';
import { Clock, RateLimitManager, systemClock } from '../../lib/rate-limit';
import {
  DocumentStore,
  RawContentStore,
  ResumeState,
  aliasMapOf,
  fromDocumentRecord,
  loadResumeState,
  toDocumentRecord,
} from '../indexing';
import { CrawlEngine, CrawlSummary } from './crawl.engine';
import { policyAddressProfile } from './traversal.rules';

export interface CrawlRunOptions {
  fresh?: boolean;                          // Ignore state and output of earlier runs
  transport?: HttpTransport;
  clock?: Clock;
  random?: () => number;
  pdfExtractor?: PdfTextExtractor;
  onEngine?: (engine: CrawlEngine) => void; // Called before the run starts, e.g. to wire signals
}

export interface CrawlReport {
  summary: CrawlSummary;
  outputPath: string;
  documentCount: number;
  chunkCount: number;
  resumed: { visited: number; pending: number; documents: number };
}

export interface ReindexReport {
  outputPath: string;
  documentCount: number;
  chunkCount: number;
}

const EMPTY_RESUME: ResumeState = { visited: [], pending: [], documents: [], snapshot: null };

export class CrawlService {
  /**
   * Run one crawl to completion (or stop) and persist its results
   */
  async runCrawl(config: CrawlerConfig, options: CrawlRunOptions = {}): Promise<CrawlReport> {
    const clock = options.clock ?? systemClock;
    const transport = options.transport ?? fetchTransport;
    const { storage, deduplication } = config;

    const stateStore = new FrontierStateStore(storage.stateFile);
    const documentStore = new DocumentStore(storage.outputJsonl);
    const rawStore = new RawContentStore({
      rawDir: storage.rawDir,
      saveHtml: storage.saveHtml,
      savePdf: storage.savePdf,
    });

    const resume =
      deduplication.enableResume && !options.fresh
        ? await loadResumeState({
            stateStore,
            documentStore,
            rawStore,
            skipExistingFiles: deduplication.skipExistingFiles,
            isRevisitable: (url) => policyAddressProfile.classify(url) === TaskKind.TOC,
          })
        : EMPTY_RESUME;

    const rateLimiter = new RateLimitManager(config.rateLimits, clock);
    const fetcher = new HttpFetcher(
      { userAgent: config.userAgent, timeouts: config.timeouts, retry: config.retry },
      {
        rateLimiter,
        transport,
        robots: config.respectRobotsTxt
          ? new RobotsTxtPolicy(transport, config.userAgent, config.timeouts, rateLimiter)
          : allowAllRobotsPolicy,
        clock,
        random: options.random,
      }
    );

    const frontier = new Frontier(
      { depthLimit: config.depthLimit, maxPages: config.maxPages, allowedHosts: config.allowedHosts },
      rateLimiter
    );
    const resolver = new DedupResolver(deduplication.preference);
    resume.documents.forEach((document) => resolver.restore(document));
    frontier.seedVisited(resume.visited);

    const engine = new CrawlEngine(
      {
        frontier,
        fetcher,
        parser: new DocumentParser(options.pdfExtractor),
        resolver,
        profile: policyAddressProfile,
        rawStore,
        statistics: new CrawlingStatisticsTracker(() => clock.now()),
      },
      {
        concurrency: config.rateLimits.globalConcurrency,
        depthLimit: config.depthLimit,
        minTextChars: config.minTextChars,
        scope: { allowedHosts: config.allowedHosts, years: config.years, languages: config.languages },
      }
    );

    const seeded = engine.seed(config.seeds);
    const pending = resume.pending.filter((task) => frontier.enqueue(task).outcome === EnqueueOutcome.QUEUED).length;
    if (resume.visited.length > 0 || resume.documents.length > 0) {
      console.log(
        `♻️  Resuming: ${resume.visited.length} URLs already done, ${pending} pending, ` +
          `${resume.documents.length} documents restored`
      );
    }
    console.log(`🚀 Crawl started with ${seeded} seed(s), max ${config.maxPages} pages`);

    options.onEngine?.(engine);
    const summary = await engine.run();

    const chunker = new TextChunker(config.rag);
    const records = summary.documents.map((document) => toDocumentRecord(document, chunker.chunk(document)));
    await documentStore.save(records, aliasMapOf(summary.documents));
    if (deduplication.enableResume) {
      await stateStore.save(frontier.snapshot());
    }

    const report: CrawlReport = {
      summary,
      outputPath: documentStore.getPath(),
      documentCount: records.length,
      chunkCount: records.reduce((total, record) => total + record.chunks.length, 0),
      resumed: { visited: resume.visited.length, pending, documents: resume.documents.length },
    };
    this.logReport(report);
    return report;
  }

  /**
   * Re-chunk the existing output with the current chunking settings
   */
  async reindex(config: CrawlerConfig): Promise<ReindexReport> {
    const documentStore = new DocumentStore(config.storage.outputJsonl);
    const { records, aliases } = await documentStore.load();
    const chunker = new TextChunker(config.rag);

    const rechunked = records.map((record) => {
      const document = fromDocumentRecord(record, aliases[record.content_hash] ?? []);
      return toDocumentRecord(document, chunker.chunk(document));
    });
    await documentStore.save(rechunked, aliases);

    const report: ReindexReport = {
      outputPath: documentStore.getPath(),
      documentCount: rechunked.length,
      chunkCount: rechunked.reduce((total, record) => total + record.chunks.length, 0),
    };
    console.log(`✅ Re-chunked ${report.documentCount} documents into ${report.chunkCount} chunks (${report.outputPath})`);
    return report;
  }

  private logReport(report: CrawlReport): void {
    const { statistics, stopReason, failures, skipped } = report.summary;
    console.log(
      `✅ Crawl finished${stopReason ? ` (stopped: ${stopReason})` : ''}: ` +
        `${statistics.pagesFetched} fetched, ${skipped.length} skipped, ${failures.length} failed, ` +
        `${statistics.duplicatesDetected} duplicates`
    );
    console.log(
      `   Parse errors: ${statistics.parseErrors}, links: ${statistics.linksDiscovered} found, ` +
        `${statistics.linksFiltered} out of scope, ${statistics.depthLimited} past depth limit`
    );
    console.log(
      `   Retries: ${statistics.retries}, max depth: ${statistics.depthReached}, ` +
        `${Math.round(statistics.bytesDownloaded / 1024)} KiB in ${(statistics.totalTime / 1000).toFixed(1)}s`
    );
    console.log(`📄 Wrote ${report.documentCount} documents, ${report.chunkCount} chunks to ${report.outputPath}`);
    if (failures.length > 0) {
      console.warn(`⚠️  Failed URLs:`);
      failures.forEach((failure) => console.warn(`   ${failure.url} (${failure.reason}): ${failure.message}`));
    }
  }
}

export const crawlService = new CrawlService();
