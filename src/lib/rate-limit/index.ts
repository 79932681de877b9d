/**
 * Rate Limit System
 * Main export file for per-host politeness control
 */

export * from './rate-limit.types';
export * from './rate-limit.manager';
export * from './token-bucket';
export * from './clock';
