/**
 * Parsing Module
 * HTML and PDF parsing for crawled documents
 */

export * from './parser.types';
export * from './html.parser';
export * from './pdf.parser';
export * from './document.parser';
