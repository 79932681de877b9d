/**
 * Traversal Types
 * Site profile and state-transition shapes for the crawl engine
 */

import type { NewTask, TaskKind, UrlTask } from '../../lib/crawling';
import type { DocumentCandidate } from '../../lib/dedup';
import type { QualityFilterSkip } from '../../lib/errors';
import type { ParsedPage } from '../../lib/parsing';

/**
 * Which discovered URLs the crawl may follow
 */
export interface SiteScope {
  allowedHosts: string[];
  years: number[];      // Empty admits every year
  languages: string[];  // Empty admits every language
}

/**
 * Everything a transition needs about one processed task
 */
export interface TransitionInput {
  task: UrlTask;
  page: ParsedPage;
  scope: SiteScope;
  depthLimit: number;
  minTextChars: number;
  fetchedAt: Date;
  rawContentHash: string;
  sourcePath: string | null;
}

export interface TransitionResult {
  candidates: DocumentCandidate[];
  next: NewTask[];
  filtered: string[];       // Out of configured years, languages or hosts
  depthLimited: string[];   // Would exceed depth_limit
  skip: QualityFilterSkip | null;
}

export type TransitionFn = (input: TransitionInput) => TransitionResult;

/**
 * Site-specific traversal rules. Supporting another site means writing a
 * new profile, not changing the engine.
 */
export interface SiteProfile {
  name: string;
  classify(url: string): TaskKind;
  isInScope(url: string, scope: SiteScope, parentUrl?: string): boolean;
  transitions: Record<TaskKind, TransitionFn>;
}
