/**
 * Indexing Module
 * Raw content mirror, document output and resume state
 */

export * from './document-record';
export * from './document.store';
export * from './raw-content.store';
export * from './resume';
