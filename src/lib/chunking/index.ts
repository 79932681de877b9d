/**
 * Chunking Module
 * Token-bounded, overlapping text segmentation
 */

export * from './chunking.types';
export * from './tokenizer';
export * from './chunker';
