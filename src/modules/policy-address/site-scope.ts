/**
 * Policy Address Site Scope
 * URL classification and year/language scoping for the Policy Address site.
 *
 * Addresses are published per year and language, e.g.
 *   /2024/en/policy.html   table of contents
 *   /2024/en/p5.html       chapter page
 *   /2024/en/pdf/full.pdf  annex or full-text PDF
 */

import { TaskKind, isAllowedHost, urlPath } from '../../lib/crawling';
import { SiteScope } from './traversal.types';

const PAGE_PATTERN = /\/p(\d+)\.html?$/i;
const PDF_PATTERN = /\.pdf$/i;
const YEAR_SEGMENT = /^(19|20)\d{2}$/;
const LANGUAGE_SEGMENTS = ['en', 'tc', 'sc'];

/**
 * TaskKind from the URL shape
 */
export function classifyUrl(url: string): TaskKind {
  const path = urlPath(url);
  if (PDF_PATTERN.test(path)) {
    return TaskKind.PDF_DOCUMENT;
  }
  if (PAGE_PATTERN.test(path)) {
    return TaskKind.CONTENT_PAGE;
  }
  return TaskKind.TOC;
}

/**
 * N of a pN.html chapter page
 */
export function pageNumberOf(url: string): number | null {
  const match = PAGE_PATTERN.exec(urlPath(url));
  return match ? parseInt(match[1], 10) : null;
}

function segments(url: string): string[] {
  return urlPath(url).split('/').filter((segment) => segment.length > 0);
}

export function yearOf(url: string): number | null {
  const segment = segments(url).find((part) => YEAR_SEGMENT.test(part));
  return segment ? parseInt(segment, 10) : null;
}

export function languageOf(url: string): string | null {
  return segments(url).find((part) => LANGUAGE_SEGMENTS.includes(part.toLowerCase()))?.toLowerCase() ?? null;
}

/**
 * Host, year and language check for a discovered URL.
 * A URL without a year segment takes its parent's year; with neither, the
 * year check passes. The language check passes for URLs without a language segment.
 */
export function isInScope(url: string, scope: SiteScope, parentUrl?: string): boolean {
  if (!isAllowedHost(url, scope.allowedHosts)) {
    return false;
  }

  const year = yearOf(url) ?? (parentUrl ? yearOf(parentUrl) : null);
  if (scope.years.length > 0 && year !== null && !scope.years.includes(year)) {
    return false;
  }

  const language = languageOf(url);
  if (scope.languages.length > 0 && language !== null && !scope.languages.includes(language)) {
    return false;
  }

  return true;
}
