/**
 * PDF Parser
 * Text, title and page segmentation for PDF documents
 */

import { textProcessor } from '../processing';
import { urlPath } from '../crawling';
import { DocumentFormat, ParsedPdfDocument, PdfPage, PdfTextExtractor, PdfTextResult } from './parser.types';

/**
 * Default extractor backed by pdf-parse, loaded on first use
 */
export class PdfParseExtractor implements PdfTextExtractor {
  async extract(data: Buffer): Promise<PdfTextResult> {
    const { default: pdfParse } = await import('pdf-parse');
    const result = await pdfParse(data);

    const info: unknown = result.info;
    const title =
      typeof info === 'object' && info !== null && 'Title' in info && typeof info.Title === 'string'
        ? info.Title
        : undefined;

    return { text: result.text, pageCount: result.numpages, title };
  }
}

export class PdfParser {
  constructor(private readonly extractor: PdfTextExtractor = new PdfParseExtractor()) {}

  async parse(data: Buffer, url: string): Promise<ParsedPdfDocument> {
    const extracted = await this.extractor.extract(data);
    const pages = this.splitPages(extracted);
    const text = pages
      ? pages.map((page) => page.text).filter((pageText) => pageText.length > 0).join('\n\n')
      : cleanPdfText(extracted.text);

    return {
      format: DocumentFormat.PDF,
      url,
      title: this.extractTitle(text, url, extracted.title),
      text,
      pageCount: extracted.pageCount,
      pages,
    };
  }

  /**
   * pdf-parse separates pages with a blank line and starts with one.
   * The split is trusted only when it yields exactly one segment per page.
   */
  private splitPages(extracted: PdfTextResult): PdfPage[] | null {
    if (extracted.pageCount < 1) {
      return null;
    }
    const segments = extracted.text.replace(/^\n\n/, '').split('\n\n');
    if (segments.length !== extracted.pageCount) {
      return null;
    }
    return segments.map((segment, index) => ({
      pageNumber: index + 1,
      text: cleanPdfText(segment),
    }));
  }

  private extractTitle(text: string, url: string, metadataTitle?: string): string {
    const fromMetadata = metadataTitle?.trim();
    if (fromMetadata && fromMetadata.length > 3) {
      return fromMetadata;
    }

    const firstLine = text.split('\n').find((line) => line.trim().length > 0)?.trim();
    if (firstLine && firstLine.length < 200) {
      return firstLine;
    }

    const filename = urlPath(url).split('/').pop() ?? '';
    if (/\.pdf$/i.test(filename)) {
      return filename
        .slice(0, -4)
        .replace(/[_-]+/g, ' ')
        .replace(/\b\w/g, (letter) => letter.toUpperCase())
        .trim();
    }
    return 'PDF Document';
  }
}

/**
 * Drop running headers, footers and page numbers, then normalize whitespace
 */
export function cleanPdfText(text: string): string {
  const lines = text
    .replace(/[ \t]+/g, ' ')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => !isRunningHeader(line));

  return textProcessor.process(lines.join('\n')).text;
}

function isRunningHeader(line: string): boolean {
  if (line.length >= 60) {
    return false;
  }
  return (
    /^\d+$/.test(line) ||
    /^page \d+/i.test(line) ||
    (line.length < 40 && (/policy address/i.test(line) || line.includes('施政報告')))
  );
}
