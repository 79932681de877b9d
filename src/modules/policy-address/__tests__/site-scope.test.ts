/**
 * Site Scope Tests
 */

import { classifyUrl, isInScope, languageOf, pageNumberOf, yearOf } from '../site-scope';
import { SiteScope } from '../traversal.types';
import { TaskKind } from '../../../lib/crawling';
import { SITE } from '../../../__tests__/helpers/fixtures';

describe('classifyUrl', () => {
  it('should recognise tables of contents, chapter pages and PDFs', () => {
    expect(classifyUrl(`${SITE}/2024/en/policy.html`)).toBe(TaskKind.TOC);
    expect(classifyUrl(`${SITE}/2024/en/`)).toBe(TaskKind.TOC);
    expect(classifyUrl(`${SITE}/2024/en/p5.html`)).toBe(TaskKind.CONTENT_PAGE);
    expect(classifyUrl(`${SITE}/2024/en/P12.htm`)).toBe(TaskKind.CONTENT_PAGE);
    expect(classifyUrl(`${SITE}/2024/en/pdf/full.PDF`)).toBe(TaskKind.PDF_DOCUMENT);
  });
});

describe('URL parts', () => {
  it('should read page number, year and language from the path', () => {
    expect(pageNumberOf(`${SITE}/2024/en/p12.html`)).toBe(12);
    expect(pageNumberOf(`${SITE}/2024/en/policy.html`)).toBeNull();
    expect(yearOf(`${SITE}/2023/TC/p1.html`)).toBe(2023);
    expect(yearOf(`${SITE}/archive/p1.html`)).toBeNull();
    expect(languageOf(`${SITE}/2023/TC/p1.html`)).toBe('tc');
    expect(languageOf(`${SITE}/2023/p1.html`)).toBeNull();
  });
});

describe('isInScope', () => {
  const scope: SiteScope = { allowedHosts: ['www.policy.example.test'], years: [2024], languages: ['en'] };

  it('should admit URLs of a configured year and language', () => {
    expect(isInScope(`${SITE}/2024/en/p1.html`, scope)).toBe(true);
  });

  it('should reject other years, languages and hosts', () => {
    expect(isInScope(`${SITE}/2023/en/p1.html`, scope)).toBe(false);
    expect(isInScope(`${SITE}/2024/tc/p1.html`, scope)).toBe(false);
    expect(isInScope('https://elsewhere.example.test/2024/en/p1.html', scope)).toBe(false);
  });

  it("should fall back to the parent's year", () => {
    const annex = `${SITE}/pdf/annex.pdf`;
    expect(isInScope(annex, scope, `${SITE}/2023/en/policy.html`)).toBe(false);
    expect(isInScope(annex, scope, `${SITE}/2024/en/policy.html`)).toBe(true);
    expect(isInScope(annex, scope)).toBe(true);
  });

  it('should admit everything on the host when years and languages are empty', () => {
    const open: SiteScope = { allowedHosts: ['www.policy.example.test'], years: [], languages: [] };
    expect(isInScope(`${SITE}/1999/sc/p1.html`, open)).toBe(true);
  });
});
