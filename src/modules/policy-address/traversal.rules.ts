/**
 * Policy Address Traversal Rules
 * One pure transition per task kind: table of contents, chapter page, PDF.
 */

import { NewTask, TaskKind } from '../../lib/crawling';
import { DocumentCandidate, DocumentMetadata } from '../../lib/dedup';
import { QualityFilterSkip } from '../../lib/errors';
import { CONTENT_TYPES, DocumentFormat, ExtractedLink, ParsedHtmlPage } from '../../lib/parsing';
import { classifyUrl, isInScope, languageOf, pageNumberOf, yearOf } from './site-scope';
import { SiteProfile, TransitionFn, TransitionInput, TransitionResult } from './traversal.types';

const NEXT_LINK_PATTERNS = ['next page', 'next', '下一頁', '下頁', '繼續'];

function emptyResult(): TransitionResult {
  return { candidates: [], next: [], filtered: [], depthLimited: [], skip: null };
}

/**
 * Sort a followed link into next, filtered or depthLimited
 */
function follow(result: TransitionResult, input: TransitionInput, url: string, kind: TaskKind): void {
  const { task, scope, depthLimit } = input;
  if (!isInScope(url, scope, task.url)) {
    result.filtered.push(url);
    return;
  }
  if (task.depth + 1 > depthLimit) {
    result.depthLimited.push(url);
    return;
  }
  const next: NewTask = { url, depth: task.depth + 1, kind, parentUrl: task.url };
  result.next.push(next);
}

function metadataFor(input: TransitionInput, pageNumber: number | null, section: string | null): DocumentMetadata {
  const { task, page } = input;
  return {
    year: yearOf(task.url) ?? (task.parentUrl ? yearOf(task.parentUrl) : null),
    language: languageOf(task.url) ?? (page.format === DocumentFormat.HTML ? page.language ?? null : null),
    pageNumber,
    section,
    sourcePath: input.sourcePath,
  };
}

function candidateFor(
  input: TransitionInput,
  url: string,
  text: string,
  pageNumber: number | null,
  section: string | null
): DocumentCandidate {
  const { page } = input;
  return {
    url,
    text,
    title: page.title,
    format: page.format,
    contentType: CONTENT_TYPES[page.format],
    metadata: metadataFor(input, pageNumber, section),
    rawContentHash: input.rawContentHash,
    fetchedAt: input.fetchedAt,
  };
}

/**
 * The "next page" link of a chapter page, if any
 */
export function findNextLink(page: ParsedHtmlPage, currentUrl: string): ExtractedLink | null {
  const links = page.links.filter((link) => link.url !== currentUrl);

  const byRel = links.find((link) => link.rel.split(/\s+/).includes('next'));
  if (byRel) return byRel;

  const byText = links.find((link) => {
    const label = `${link.text} ${link.title}`.toLowerCase();
    return NEXT_LINK_PATTERNS.some((pattern) => label.includes(pattern));
  });
  if (byText) return byText;

  const current = pageNumberOf(currentUrl);
  return (
    links.find((link) => {
      if (!link.inNavigation) return false;
      const target = pageNumberOf(link.url);
      return target !== null && (current === null || target > current);
    }) ?? null
  );
}

/**
 * Table of contents: follow chapter and PDF links, emit nothing
 */
export const tocTransition: TransitionFn = (input) => {
  const result = emptyResult();
  if (input.page.format !== DocumentFormat.HTML) {
    return result;
  }

  const seen = new Set<string>();
  for (const link of input.page.links) {
    const kind = classifyUrl(link.url);
    if (kind === TaskKind.TOC || seen.has(link.url)) continue;
    seen.add(link.url);
    follow(result, input, link.url, kind);
  }
  return result;
};

/**
 * Chapter page: one candidate, then the "next" page if there is one.
 * A skipped page ends there and follows nothing.
 */
export const contentPageTransition: TransitionFn = (input) => {
  const result = emptyResult();
  const { task, page } = input;
  if (page.format !== DocumentFormat.HTML) {
    return pdfTransition(input);
  }

  if (page.text.length < input.minTextChars) {
    result.skip = new QualityFilterSkip(task.url, `only ${page.text.length} characters of text`);
    return result;
  }
  result.candidates.push(candidateFor(input, task.url, page.text, pageNumberOf(task.url), page.section ?? null));

  const next = findNextLink(page, task.url);
  if (next) {
    follow(result, input, next.url, TaskKind.CONTENT_PAGE);
  }
  return result;
};

/**
 * PDF: one candidate per page when pages are known, else one for the file. Terminal.
 */
export const pdfTransition: TransitionFn = (input) => {
  const result = emptyResult();
  const { task, page } = input;
  if (page.format !== DocumentFormat.PDF) {
    return contentPageTransition(input);
  }

  if (page.pages) {
    for (const pdfPage of page.pages) {
      if (pdfPage.text.length < input.minTextChars) continue;
      result.candidates.push(
        candidateFor(input, `${task.url}#page=${pdfPage.pageNumber}`, pdfPage.text, pdfPage.pageNumber, null)
      );
    }
  } else if (page.text.length >= input.minTextChars) {
    result.candidates.push(candidateFor(input, task.url, page.text, null, null));
  }

  if (result.candidates.length === 0) {
    result.skip = new QualityFilterSkip(task.url, 'no page with enough text');
  }
  return result;
};

export const policyAddressProfile: SiteProfile = {
  name: 'policy-address',
  classify: classifyUrl,
  isInScope,
  transitions: {
    [TaskKind.TOC]: tocTransition,
    [TaskKind.CONTENT_PAGE]: contentPageTransition,
    [TaskKind.PDF_DOCUMENT]: pdfTransition,
  },
};
