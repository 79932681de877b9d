/**
 * Content Hashing
 * Whitespace-insensitive digests used to recognise the same text in different renditions
 */

import { createHash } from 'crypto';

const HASH_PREFIX = 'sha256:';

/**
 * Collapse every whitespace run to one space and trim; case is kept
 */
export function normalizeForHash(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Hash of the normalized text, e.g. "sha256:9f86d0..."
 */
export function contentHash(text: string): string {
  return HASH_PREFIX + createHash('sha256').update(normalizeForHash(text), 'utf8').digest('hex');
}

/**
 * Hash of a fetched body as received
 */
export function rawContentHash(body: Buffer): string {
  return HASH_PREFIX + createHash('sha256').update(body).digest('hex');
}
