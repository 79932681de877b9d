/**
 * Dedup Types
 * Candidates produced by traversal and the canonical documents they resolve to
 */

import { DocumentFormat } from '../parsing';

export interface DocumentMetadata {
  year: number | null;
  language: string | null;
  pageNumber: number | null;
  section: string | null;
  sourcePath: string | null;  // Saved raw file, or the URL path when nothing was saved
}

/**
 * Text extracted from one fetched page (or one PDF page)
 */
export interface DocumentCandidate {
  url: string;
  text: string;
  title: string;
  format: DocumentFormat;
  contentType: string;
  metadata: DocumentMetadata;
  rawContentHash: string;
  fetchedAt: Date;
}

/**
 * The single document kept for a content hash
 */
export interface CanonicalDocument {
  contentHash: string;
  chosenUrl: string;
  title: string;
  text: string;
  format: DocumentFormat;
  contentType: string;
  metadata: DocumentMetadata;
  aliasUrls: Set<string>;   // Other URLs with the same normalized text
  crawledAt: Date;
}

export enum ResolveAction {
  CREATED = 'created',    // First document with this hash
  REPLACED = 'replaced',  // Candidate displaced the previous canonical
  ALIASED = 'aliased',    // Candidate folded into the existing canonical
}

export interface ResolveOutcome {
  action: ResolveAction;
  document: CanonicalDocument;
}
