/**
 * Document Parser
 * Picks the HTML or PDF parser for a fetched body
 */

import { ParseError } from '../errors';
import { HtmlParser } from './html.parser';
import { PdfParser } from './pdf.parser';
import { DocumentFormat, ParsedPage, PdfTextExtractor } from './parser.types';

export interface ParseInput {
  url: string;          // Task URL, used for the parsed page
  finalUrl: string;     // URL after redirects, used to resolve links
  contentType: string;
  body: Buffer;
}

export class DocumentParser {
  private readonly htmlParser: HtmlParser;
  private readonly pdfParser: PdfParser;

  constructor(pdfExtractor?: PdfTextExtractor) {
    this.htmlParser = new HtmlParser();
    this.pdfParser = new PdfParser(pdfExtractor);
  }

  /**
   * Parse a fetched body; throws ParseError when it cannot be read
   */
  async parse(input: ParseInput): Promise<ParsedPage> {
    const format = detectFormat(input.contentType, input.body);
    if (!format) {
      throw new ParseError(input.url, `unsupported content type "${input.contentType}"`);
    }

    if (format === DocumentFormat.PDF) {
      try {
        return await this.pdfParser.parse(input.body, input.url);
      } catch (error: unknown) {
        throw new ParseError(input.url, 'PDF text extraction failed', error instanceof Error ? error : undefined);
      }
    }

    const page = this.htmlParser.parse(input.body.toString('utf8'), input.finalUrl);
    return { ...page, url: input.url };
  }
}

/**
 * Format from the Content-Type header, falling back to sniffing the body
 */
export function detectFormat(contentType: string, body: Buffer): DocumentFormat | null {
  const type = contentType.toLowerCase();
  const head = body.subarray(0, 512).toString('utf8').trimStart().toLowerCase();

  if (type.includes('application/pdf') || head.startsWith('%pdf')) {
    return DocumentFormat.PDF;
  }
  if (
    type.includes('text/html') ||
    type.includes('application/xhtml') ||
    head.startsWith('<!doctype html') ||
    head.startsWith('<html')
  ) {
    return DocumentFormat.HTML;
  }
  return null;
}
