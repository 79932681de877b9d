/**
 * Resume
 * Gathers what earlier runs left behind so a new run skips finished work
 */

import { FrontierSnapshot, FrontierStateStore, PendingTaskState } from '../../lib/crawling';
import { CanonicalDocument } from '../../lib/dedup';
import { DocumentStore } from './document.store';
import { fromDocumentRecord } from './document-record';
import { RawContentStore } from './raw-content.store';

export interface ResumeSources {
  stateStore: FrontierStateStore;
  documentStore: DocumentStore;
  rawStore?: RawContentStore;
  skipExistingFiles: boolean;
  isRevisitable: (url: string) => boolean; // URLs fetched again on every run (tables of contents)
}

export interface ResumeState {
  visited: string[];                // Seed into the frontier as already done
  pending: PendingTaskState[];      // Re-enqueue
  documents: CanonicalDocument[];   // Restore into the resolver
  snapshot: FrontierSnapshot | null;
}

export async function loadResumeState(sources: ResumeSources): Promise<ResumeState> {
  const snapshot = await sources.stateStore.load();
  const { records, aliases } = await sources.documentStore.load();

  const urls = new Set<string>(snapshot?.completed ?? []);
  const documents = records.map((record) => {
    urls.add(record.url);
    const recordAliases = aliases[record.content_hash] ?? [];
    recordAliases.forEach((alias) => urls.add(alias));
    return fromDocumentRecord(record, recordAliases);
  });

  if (sources.skipExistingFiles && sources.rawStore) {
    (await sources.rawStore.listUrls()).forEach((url) => urls.add(url));
  }

  return {
    visited: Array.from(urls).filter((url) => !sources.isRevisitable(url)).sort(),
    pending: snapshot?.pending ?? [],
    documents,
    snapshot,
  };
}
