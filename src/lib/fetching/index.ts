/**
 * Fetching System
 * Main export file for the retrying HTTP fetch layer
 */

export * from './fetch.types';
export * from './fetch.errors';
export * from './http-transport';
export * from './robots.policy';
export * from './fetcher';
