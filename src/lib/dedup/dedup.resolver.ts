/**
 * Dedup Resolver
 * Keeps one canonical document per content hash.
 *
 * When the same normalized text arrives from several URLs (typically a
 * chapter page and the matching page of the PDF edition), the rendition in
 * the preferred format wins; between equally ranked renditions the
 * lexicographically smaller URL wins. Either way the result does not depend
 * on which fetch finished first.
 */

import { DocumentFormat } from '../parsing';
import { contentHash } from './content-hash';
import { CanonicalDocument, DocumentCandidate, ResolveAction, ResolveOutcome } from './dedup.types';

interface Rendition {
  url: string;
  format: DocumentFormat;
}

export class DedupResolver {
  private byHash: Map<string, CanonicalDocument> = new Map();

  constructor(private readonly preference: DocumentFormat = DocumentFormat.HTML) {}

  /**
   * Fold a candidate into the canonical set
   */
  resolve(candidate: DocumentCandidate): ResolveOutcome {
    const hash = contentHash(candidate.text);
    const existing = this.byHash.get(hash);

    if (!existing) {
      const document: CanonicalDocument = {
        contentHash: hash,
        chosenUrl: candidate.url,
        title: candidate.title,
        text: candidate.text,
        format: candidate.format,
        contentType: candidate.contentType,
        metadata: { ...candidate.metadata },
        aliasUrls: new Set(),
        crawledAt: candidate.fetchedAt,
      };
      this.byHash.set(hash, document);
      return { action: ResolveAction.CREATED, document };
    }

    if (!this.outranks({ url: candidate.url, format: candidate.format }, { url: existing.chosenUrl, format: existing.format })) {
      if (candidate.url !== existing.chosenUrl) {
        existing.aliasUrls.add(candidate.url);
      }
      return { action: ResolveAction.ALIASED, document: existing };
    }

    const aliasUrls = new Set(existing.aliasUrls);
    aliasUrls.add(existing.chosenUrl);
    aliasUrls.delete(candidate.url);

    const document: CanonicalDocument = {
      contentHash: hash,
      chosenUrl: candidate.url,
      title: candidate.title,
      text: candidate.text,
      format: candidate.format,
      contentType: candidate.contentType,
      metadata: { ...candidate.metadata },
      aliasUrls,
      crawledAt: candidate.fetchedAt,
    };
    this.byHash.set(hash, document);
    return { action: ResolveAction.REPLACED, document };
  }

  /**
   * Seed with a document kept by an earlier run
   */
  restore(document: CanonicalDocument): void {
    const existing = this.byHash.get(document.contentHash);
    if (!existing) {
      this.byHash.set(document.contentHash, { ...document, aliasUrls: new Set(document.aliasUrls) });
      return;
    }

    const [winner, loser] = this.outranks(
      { url: document.chosenUrl, format: document.format },
      { url: existing.chosenUrl, format: existing.format }
    )
      ? [document, existing]
      : [existing, document];

    const aliasUrls = new Set([...winner.aliasUrls, ...loser.aliasUrls, loser.chosenUrl]);
    aliasUrls.delete(winner.chosenUrl);
    this.byHash.set(document.contentHash, { ...winner, aliasUrls });
  }

  /**
   * Every URL known to the resolver, chosen or aliased
   */
  knownUrls(): string[] {
    const urls: string[] = [];
    for (const document of this.byHash.values()) {
      urls.push(document.chosenUrl, ...document.aliasUrls);
    }
    return urls;
  }

  size(): number {
    return this.byHash.size;
  }

  /**
   * Canonical documents ordered by chosen URL
   */
  documents(): CanonicalDocument[] {
    return Array.from(this.byHash.values()).sort((a, b) => compareUrls(a.chosenUrl, b.chosenUrl));
  }

  private outranks(candidate: Rendition, current: Rendition): boolean {
    const candidateRank = this.rank(candidate.format);
    const currentRank = this.rank(current.format);
    if (candidateRank !== currentRank) {
      return candidateRank < currentRank;
    }
    return compareUrls(candidate.url, current.url) < 0;
  }

  private rank(format: DocumentFormat): number {
    return format === this.preference ? 0 : 1;
  }
}

/**
 * Code-unit order, independent of locale
 */
function compareUrls(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
