/**
 * Content Processing
 * Main export file for text processing
 */

export * from './text.processor';
