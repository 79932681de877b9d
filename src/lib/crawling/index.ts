/**
 * Crawling System
 * Main export file for the URL frontier and crawl bookkeeping
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './frontier';
export * from './frontier.store';
export * from './crawling-statistics';
