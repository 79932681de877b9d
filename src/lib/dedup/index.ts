/**
 * Dedup Module
 * Content-hash canonicalisation of crawled documents
 */

export * from './dedup.types';
export * from './content-hash';
export * from './dedup.resolver';
