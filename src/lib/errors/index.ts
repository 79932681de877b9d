/**
 * Errors Module
 * Exports the crawler error taxonomy
 */

export * from './crawler.errors';
