/**
 * Policy Address Module
 * Site profile, crawl engine and the service that runs them
 */

export * from './traversal.types';
export * from './site-scope';
export * from './traversal.rules';
export * from './crawl.engine';
export * from './crawl.service';
