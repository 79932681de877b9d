/**
 * Crawl Engine Tests
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { CrawlEngine, PageFetcher } from '../crawl.engine';
import { policyAddressProfile } from '../traversal.rules';
import { Frontier, StopReason, TaskKind, UrlTask } from '../../../lib/crawling';
import { DedupResolver } from '../../../lib/dedup';
import { FetchErrorType, FetchResult, FetchStatus } from '../../../lib/fetching';
import { DocumentParser } from '../../../lib/parsing';
import { RawContentStore } from '../../indexing';
import { StubPdfExtractor } from '../../../__tests__/helpers/mocks';
import { SITE, contentHtml, sampleParagraphs, tocHtml } from '../../../__tests__/helpers/fixtures';

const tocUrl = `${SITE}/2024/en/policy.html`;
const p1Url = `${SITE}/2024/en/p1.html`;
const p2Url = `${SITE}/2024/en/p2.html`;
const p9Url = `${SITE}/2024/en/p9.html`;
const pdfUrl = `${SITE}/2024/en/pdf/full.pdf`;
const annexText = 'Annex tables follow here in full detail.';

type Reply =
  | { body: string; contentType?: string }
  | { aborted: true };

/**
 * Answers from a fixed table; unknown URLs fail with 404
 */
class StubFetcher implements PageFetcher {
  readonly calls: string[] = [];
  onFetch?: (url: string) => void;

  constructor(private readonly replies: Map<string, Reply>) {}

  async fetch(task: UrlTask): Promise<FetchResult> {
    this.calls.push(task.url);
    this.onFetch?.(task.url);

    const reply = this.replies.get(task.url);
    if (!reply) {
      return {
        status: FetchStatus.PERMANENT_ERROR,
        task,
        error: { type: FetchErrorType.NOT_FOUND, message: 'HTTP 404', retryable: false },
        httpStatus: 404,
        attemptCount: 1,
        elapsedMs: 1,
      };
    }
    if ('aborted' in reply) {
      return {
        status: FetchStatus.TRANSIENT_ERROR,
        task,
        error: { type: FetchErrorType.ABORTED, message: 'Stopped while waiting for admission', retryable: false },
        attemptCount: 0,
        elapsedMs: 0,
      };
    }
    return {
      status: FetchStatus.OK,
      task,
      httpStatus: 200,
      contentType: reply.contentType ?? 'text/html; charset=utf-8',
      body: Buffer.from(reply.body, 'utf8'),
      finalUrl: task.url,
      attemptCount: 1,
      elapsedMs: 5,
    };
  }
}

function siteReplies(): Map<string, Reply> {
  return new Map<string, Reply>([
    [
      tocUrl,
      {
        body: tocHtml([
          { href: 'p1.html', text: 'Housing' },
          { href: 'p2.html', text: 'Notes' },
          { href: 'pdf/full.pdf', text: 'Full text (PDF)' },
          { href: 'p9.html', text: 'Removed chapter' },
        ]),
      },
    ],
    [p1Url, { body: contentHtml({ title: 'Housing', heading: 'Housing', paragraphs: sampleParagraphs, next: { href: 'p2.html' } }) }],
    [p2Url, { body: contentHtml({ title: 'Notes', heading: 'Tiny', paragraphs: ['Ok.'] }) }],
    [pdfUrl, { body: '%PDF-1.4 test', contentType: 'application/pdf' }],
  ]);
}

// Page 1 of the PDF repeats the Housing chapter with different line breaks
const pdfExtractor = new StubPdfExtractor({
  text: `\n\nHousing\n${sampleParagraphs[0]}\n${sampleParagraphs[1]}\n\n${annexText}`,
  pageCount: 2,
});

function createEngine(fetcher: PageFetcher, concurrency: number = 1, rawStore?: RawContentStore) {
  const frontier = new Frontier({ depthLimit: 3, maxPages: 50, allowedHosts: ['www.policy.example.test'] });
  const engine = new CrawlEngine(
    {
      frontier,
      fetcher,
      parser: new DocumentParser(pdfExtractor),
      resolver: new DedupResolver(),
      profile: policyAddressProfile,
      rawStore,
      now: () => new Date(0),
    },
    {
      concurrency,
      depthLimit: 3,
      minTextChars: 20,
      scope: { allowedHosts: ['www.policy.example.test'], years: [2024], languages: ['en'] },
    }
  );
  return { engine, frontier };
}

describe('CrawlEngine', () => {
  it('should crawl the table of contents, chapters and PDF into canonical documents', async () => {
    const fetcher = new StubFetcher(siteReplies());
    const { engine } = createEngine(fetcher);

    expect(engine.seed([tocUrl])).toBe(1);
    const summary = await engine.run();

    expect(fetcher.calls).toEqual([tocUrl, p1Url, p2Url, pdfUrl, p9Url]);
    expect(summary.documents.map((document) => document.chosenUrl)).toEqual([p1Url, `${pdfUrl}#page=2`]);
    expect(summary.documents[0].aliasUrls).toEqual(new Set([`${pdfUrl}#page=1`]));
    expect(summary.documents[1].text).toBe(annexText);
    expect(summary.skipped).toEqual([p2Url]);
    expect(summary.failures).toEqual([
      { url: p9Url, reason: FetchErrorType.NOT_FOUND, message: 'HTTP 404', attemptCount: 1 },
    ]);
    expect(summary.stopReason).toBeNull();
    expect(summary.statistics).toMatchObject({
      pagesFetched: 4,
      pagesSkipped: 1,
      permanentFailures: 1,
      duplicatesDetected: 1,
      linksDiscovered: 5,
    });
  });

  it('should pick the same canonical documents with several workers', async () => {
    const fetcher = new StubFetcher(siteReplies());
    const { engine } = createEngine(fetcher, 4);

    engine.seed([tocUrl]);
    const summary = await engine.run();

    expect(summary.documents.map((document) => document.chosenUrl)).toEqual([p1Url, `${pdfUrl}#page=2`]);
    expect(summary.documents[0].aliasUrls).toEqual(new Set([`${pdfUrl}#page=1`]));
    expect(new Set(fetcher.calls).size).toBe(fetcher.calls.length);
  });

  it('should fail tasks whose body cannot be parsed', async () => {
    const fetcher = new StubFetcher(new Map([[tocUrl, { body: 'binary', contentType: 'application/octet-stream' }]]));
    const { engine } = createEngine(fetcher);

    engine.seed([tocUrl]);
    const summary = await engine.run();

    expect(summary.failures).toEqual([
      {
        url: tocUrl,
        reason: 'PARSE_ERROR',
        message: `Could not parse ${tocUrl}: unsupported content type "application/octet-stream"`,
        attemptCount: 1,
      },
    ]);
    expect(summary.statistics.parseErrors).toBe(1);
  });

  it('should not follow the next link of a page it skipped', async () => {
    const fetcher = new StubFetcher(
      new Map<string, Reply>([
        [p1Url, { body: contentHtml({ title: 'Short', heading: 'Hi', paragraphs: ['Ok.'], next: { href: 'p2.html' } }) }],
        [p2Url, { body: contentHtml({ title: 'Housing', heading: 'Housing', paragraphs: sampleParagraphs }) }],
      ])
    );
    const { engine, frontier } = createEngine(fetcher);

    engine.seed([p1Url]);
    const summary = await engine.run();

    expect(fetcher.calls).toEqual([p1Url]);
    expect(summary.skipped).toEqual([p1Url]);
    expect(summary.documents).toEqual([]);
    expect(summary.statistics.linksDiscovered).toBe(0);
    expect(frontier.hasVisited(p2Url)).toBe(false);
  });

  it('should stop on request and keep unfinished tasks pending', async () => {
    const replies = siteReplies();
    replies.set(p1Url, { aborted: true });
    const fetcher = new StubFetcher(replies);
    const { engine, frontier } = createEngine(fetcher);
    fetcher.onFetch = (url) => {
      if (url === p1Url) engine.stop();
    };

    engine.seed([tocUrl]);
    const summary = await engine.run();

    expect(fetcher.calls).toEqual([tocUrl, p1Url]);
    expect(summary.stopReason).toBe(StopReason.OPERATOR);
    expect(summary.failures).toEqual([]);
    expect(frontier.snapshot().pending.map((task) => task.url)).toEqual([p1Url, p2Url, pdfUrl, p9Url]);
    expect(frontier.snapshot().completed).toEqual([tocUrl]);
  });

  it('should record where the raw body was saved', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'engine-raw-'));
    try {
      const rawStore = new RawContentStore({ rawDir: dir, saveHtml: true, savePdf: false });
      const fetcher = new StubFetcher(new Map([[p1Url, siteReplies().get(p1Url) ?? { body: '' }]]));
      const { engine } = createEngine(fetcher, 1, rawStore);

      engine.seed([p1Url]);
      const summary = await engine.run();

      expect(summary.documents[0].metadata.sourcePath).toBe(rawStore.pathFor(p1Url));
      await expect(rawStore.exists(p1Url)).resolves.toBe(true);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('should classify seeds by URL shape', () => {
    const { engine, frontier } = createEngine(new StubFetcher(new Map()));

    engine.seed([tocUrl, pdfUrl, tocUrl]);

    expect(frontier.size()).toBe(2);
    expect(frontier.dequeue()?.kind).toBe(TaskKind.TOC);
    expect(frontier.dequeue()?.kind).toBe(TaskKind.PDF_DOCUMENT);
  });
});
