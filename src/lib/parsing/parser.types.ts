/**
 * Parser Types
 * Shapes produced by the HTML and PDF parsers
 */

export enum DocumentFormat {
  HTML = 'html',
  PDF = 'pdf',
}

/**
 * MIME type written to output records for each format
 */
export const CONTENT_TYPES: Record<DocumentFormat, string> = {
  [DocumentFormat.HTML]: 'text/html',
  [DocumentFormat.PDF]: 'application/pdf',
};

/**
 * Anchor found in a page, resolved against the page URL
 */
export interface ExtractedLink {
  url: string;            // Normalized absolute URL, fragment removed
  href: string;           // Attribute value as written
  text: string;           // Anchor text, whitespace collapsed
  title: string;          // title attribute or ''
  rel: string;            // rel attribute, lowercase, or ''
  inNavigation: boolean;  // Inside <nav> or a nav/pagination container
}

export interface ParsedHtmlPage {
  format: DocumentFormat.HTML;
  url: string;
  title: string;
  text: string;
  language?: string;  // <html lang>
  section?: string;   // First h1/h2 of the main content
  links: ExtractedLink[];
}

export interface PdfPage {
  pageNumber: number; // 1-based
  text: string;
}

export interface ParsedPdfDocument {
  format: DocumentFormat.PDF;
  url: string;
  title: string;
  text: string;
  pageCount: number;

  /**
   * Per-page text, or null when the extractor output could not be split
   * into exactly pageCount pages
   */
  pages: PdfPage[] | null;
}

export type ParsedPage = ParsedHtmlPage | ParsedPdfDocument;

/**
 * Raw output of a PDF text extraction library
 */
export interface PdfTextResult {
  text: string;
  pageCount: number;
  title?: string;
}

/**
 * Pluggable PDF text extraction
 */
export interface PdfTextExtractor {
  extract(data: Buffer): Promise<PdfTextResult>;
}
