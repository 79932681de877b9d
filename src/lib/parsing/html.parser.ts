/**
 * HTML Parser
 * Title, links and main-content text extraction with cheerio
 */

import * as cheerio from 'cheerio';
import { normalizeUrl } from '../crawling';
import { textProcessor } from '../processing';
import { DocumentFormat, ExtractedLink, ParsedHtmlPage } from './parser.types';

// Placeholders for structural breaks; neither matches \s, so they survive
// whitespace collapsing and are turned into newlines afterwards
const PARAGRAPH_MARK = '\u241E';
const LINE_MARK = '\u241F';

const NOISE_SELECTORS = ['script', 'style', 'noscript', 'template', 'iframe', 'nav', 'header', 'footer', 'aside'];

const MAIN_CONTENT_SELECTORS = ['main', 'article', '[role="main"]', '.content', '#content', '.main', '#main'];

const BLOCK_SELECTOR = [
  'p', 'div', 'section', 'article', 'main', 'blockquote', 'pre', 'address', 'figure', 'figcaption',
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  'ul', 'ol', 'li', 'dl', 'dt', 'dd',
  'table', 'thead', 'tbody', 'tr',
].join(', ');

const NAVIGATION_CLASS = /nav|pagination|next/i;

export class HtmlParser {
  /**
   * Parse an HTML document fetched from url
   */
  parse(html: string, url: string): ParsedHtmlPage {
    const $ = cheerio.load(html);

    const title = this.extractTitle($);
    const language = $('html').attr('lang')?.trim() || undefined;

    // Links first: navigation is removed with the rest of the page chrome
    const links = this.extractLinks($, url);

    $(NOISE_SELECTORS.join(', ')).remove();

    const contentSelector = this.findMainContent($);
    const section = collapse($(contentSelector).first().find('h1, h2').first().text()) || undefined;
    const text = this.extractText($, contentSelector);

    return {
      format: DocumentFormat.HTML,
      url,
      title,
      text,
      language,
      section,
      links,
    };
  }

  private extractTitle($: cheerio.CheerioAPI): string {
    const candidates = [
      $('title').first().text(),
      $('h1').first().text(),
      $('meta[property="og:title"]').attr('content') ?? '',
    ];
    for (const candidate of candidates) {
      const title = collapse(candidate);
      if (title) return title;
    }
    return 'Untitled';
  }

  private extractLinks($: cheerio.CheerioAPI, baseUrl: string): ExtractedLink[] {
    const links: ExtractedLink[] = [];

    $('a[href]').each((_, el) => {
      const anchor = $(el);
      const href = (anchor.attr('href') ?? '').trim();
      if (!href || href.startsWith('#') || /^(javascript|mailto|tel):/i.test(href)) {
        return;
      }

      const url = normalizeUrl(href, baseUrl);
      if (!url) return;

      const inNavigation =
        anchor.parents().filter((_, parent) => {
          const container = $(parent);
          return container.is('nav') || NAVIGATION_CLASS.test(container.attr('class') ?? '');
        }).length > 0;

      links.push({
        url,
        href,
        text: collapse(anchor.text()),
        title: collapse(anchor.attr('title') ?? ''),
        rel: (anchor.attr('rel') ?? '').trim().toLowerCase(),
        inNavigation,
      });
    });

    return links;
  }

  /**
   * Selector of the element holding the page's main text
   */
  private findMainContent($: cheerio.CheerioAPI): string {
    return MAIN_CONTENT_SELECTORS.find((selector) => $(selector).length > 0) ?? 'body';
  }

  /**
   * Visible text with block elements separated by blank lines
   */
  private extractText($: cheerio.CheerioAPI, contentSelector: string): string {
    const content = $(contentSelector).first();
    content.find('br').replaceWith(LINE_MARK);
    content.find(BLOCK_SELECTOR).each((_, el) => {
      $(el).prepend(PARAGRAPH_MARK).append(PARAGRAPH_MARK);
    });

    const raw = content
      .text()
      .replace(/\s+/g, ' ')
      .replace(/[ \u241E\u241F]*\u241E[ \u241E\u241F]*/g, '\n\n')
      .replace(/ *\u241F */g, '\n');

    return textProcessor.process(raw).text;
  }
}

function collapse(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}
