/**
 * Document Record
 * The JSONL line written for each canonical document, and its conversions
 */

import { z } from 'zod';
import { Chunk } from '../../lib/chunking';
import { CanonicalDocument } from '../../lib/dedup';
import { CONTENT_TYPES, DocumentFormat } from '../../lib/parsing';

const ChunkRecordSchema = z.object({
  id: z.string(),
  content: z.string(),
  token_count: z.number().int().min(0),
  start_char: z.number().int().min(0),
  end_char: z.number().int().min(0),
});

export const DocumentRecordSchema = z.object({
  url: z.string().min(1),
  title: z.string(),
  content: z.string(),
  content_hash: z.string().startsWith('sha256:'),
  content_type: z.string(),
  metadata: z.object({
    year: z.number().int().nullable(),
    language: z.string().nullable(),
    page_number: z.number().int().nullable(),
    section: z.string().nullable(),
    file_path: z.string().nullable(),
  }),
  chunks: z.array(ChunkRecordSchema),
  crawled_at: z.string(),
});

export type DocumentRecord = z.infer<typeof DocumentRecordSchema>;
export type ChunkRecord = z.infer<typeof ChunkRecordSchema>;

/**
 * content_hash -> alias URLs, kept beside the JSONL file
 */
export type AliasMap = Record<string, string[]>;

export function toDocumentRecord(document: CanonicalDocument, chunks: readonly Chunk[]): DocumentRecord {
  return {
    url: document.chosenUrl,
    title: document.title,
    content: document.text,
    content_hash: document.contentHash,
    content_type: document.contentType,
    metadata: {
      year: document.metadata.year,
      language: document.metadata.language,
      page_number: document.metadata.pageNumber,
      section: document.metadata.section,
      file_path: document.metadata.sourcePath,
    },
    chunks: chunks.map((chunk) => ({
      id: chunk.id,
      content: chunk.text,
      token_count: chunk.tokenCount,
      start_char: chunk.startChar,
      end_char: chunk.endChar,
    })),
    crawled_at: document.crawledAt.toISOString(),
  };
}

/**
 * Rebuild a canonical document from a stored record
 */
export function fromDocumentRecord(record: DocumentRecord, aliasUrls: string[] = []): CanonicalDocument {
  const format = record.content_type === CONTENT_TYPES[DocumentFormat.PDF] ? DocumentFormat.PDF : DocumentFormat.HTML;
  const crawledAt = new Date(record.crawled_at);
  return {
    contentHash: record.content_hash,
    chosenUrl: record.url,
    title: record.title,
    text: record.content,
    format,
    contentType: record.content_type,
    metadata: {
      year: record.metadata.year,
      language: record.metadata.language,
      pageNumber: record.metadata.page_number,
      section: record.metadata.section,
      sourcePath: record.metadata.file_path,
    },
    aliasUrls: new Set(aliasUrls),
    crawledAt: Number.isNaN(crawledAt.getTime()) ? new Date(0) : crawledAt,
  };
}

/**
 * Alias sidecar content for a set of documents, sorted for stable output
 */
export function aliasMapOf(documents: CanonicalDocument[]): AliasMap {
  const aliases: AliasMap = {};
  for (const document of [...documents].sort((a, b) => (a.contentHash < b.contentHash ? -1 : 1))) {
    if (document.aliasUrls.size > 0) {
      aliases[document.contentHash] = Array.from(document.aliasUrls).sort();
    }
  }
  return aliases;
}
