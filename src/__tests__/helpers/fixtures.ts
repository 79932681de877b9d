/**
 * Test Fixtures
 * Reusable tasks and Policy Address style pages
 */

import { TaskKind, UrlTask, extractHost } from '../../lib/crawling';

export const SITE = 'https://www.policy.example.test';

export function makeTask(url: string, kind: TaskKind = TaskKind.CONTENT_PAGE, depth: number = 1): UrlTask {
  return {
    handle: 0,
    url,
    host: extractHost(url),
    depth,
    kind,
    discoveredAt: new Date(0),
  };
}

/**
 * Table of contents page linking to chapters and annexes
 */
export function tocHtml(links: Array<{ href: string; text: string }>, lang: string = 'en'): string {
  const items = links.map((link) => `      <li><a href="${link.href}">${link.text}</a></li>`).join('\n');
  return `<!DOCTYPE html>
<html lang="${lang}">
<head><title>The Policy Address</title></head>
<body>
  <header><a href="/">Home</a></header>
  <main>
    <h1>Contents</h1>
    <ul>
${items}
    </ul>
  </main>
  <footer>Footer text</footer>
</body>
</html>`;
}

/**
 * Chapter page with optional "next" navigation
 */
export function contentHtml(options: {
  title: string;
  heading: string;
  paragraphs: string[];
  next?: { href: string; text?: string };
  lang?: string;
}): string {
  const paragraphs = options.paragraphs.map((text) => `    <p>${text}</p>`).join('\n');
  const next = options.next
    ? `  <div class="pagination"><a href="${options.next.href}">${options.next.text ?? 'Next page'}</a></div>`
    : '';
  return `<!DOCTYPE html>
<html lang="${options.lang ?? 'en'}">
<head><title>${options.title}</title></head>
<body>
  <nav><a href="policy.html">Contents</a></nav>
  <main>
    <h1>${options.heading}</h1>
${paragraphs}
  </main>
${next}
  <script>var tracking = true;</script>
</body>
</html>`;
}

export const sampleParagraphs = [
  'The Government will continue to expand land supply for housing in the coming five years.',
  'A new fund will support small enterprises that adopt digital tools in their daily operations.',
];
