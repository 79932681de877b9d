/**
 * Text Chunker
 * Deterministic token windows with overlap, snapped back to paragraph or
 * heading starts when one is close enough.
 *
 * A chunk over tokens [a, b) covers the characters from the start of token a
 * (0 for the first chunk) up to the start of token b (end of text for the
 * last chunk), so whitespace after a token stays with the chunk before it
 * and the chunks, overlap removed, add up to the original text.
 */

import { tokenize } from './tokenizer';
import { Chunk, ChunkSource, ChunkingConfig, TokenSpan } from './chunking.types';

const BLANK_LINE = /\n[^\S\n]*\n/;
const HEADING_LINE = /^(#{1,6}\s|(chapter|part|section|annex|appendix)\s+\S|第[一二三四五六七八九十百千\d]+[章節部篇])/i;

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSizeTokens: 1000,
  chunkOverlapTokens: 150,
  respectBoundaries: true,
  boundarySearchTokens: 200,
};

export class TextChunker {
  private readonly config: ChunkingConfig;

  constructor(config: Partial<ChunkingConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };

    const { chunkSizeTokens, chunkOverlapTokens, boundarySearchTokens } = this.config;
    if (!Number.isInteger(chunkSizeTokens) || chunkSizeTokens < 1) {
      throw new RangeError('chunkSizeTokens must be a positive integer');
    }
    if (!Number.isInteger(chunkOverlapTokens) || chunkOverlapTokens < 0) {
      throw new RangeError('chunkOverlapTokens must be a non-negative integer');
    }
    if (chunkOverlapTokens >= chunkSizeTokens) {
      throw new RangeError('chunkOverlapTokens must be smaller than chunkSizeTokens');
    }
    if (!Number.isInteger(boundarySearchTokens) || boundarySearchTokens < 0) {
      throw new RangeError('boundarySearchTokens must be a non-negative integer');
    }
  }

  /**
   * Split a document into frozen chunks; text with no tokens gives none
   */
  chunk(document: ChunkSource): readonly Chunk[] {
    const { text } = document;
    const tokens = tokenize(text);
    const chunks: Chunk[] = [];
    const { chunkSizeTokens, chunkOverlapTokens } = this.config;

    let a = 0;
    while (a < tokens.length) {
      let b = Math.min(a + chunkSizeTokens, tokens.length);
      if (b < tokens.length && this.config.respectBoundaries) {
        b = this.findBoundary(text, tokens, a, b);
      }

      const startChar = chunks.length === 0 ? 0 : tokens[a].start;
      const endChar = b < tokens.length ? tokens[b].start : text.length;
      const sequenceId = chunks.length;

      chunks.push(
        Object.freeze({
          id: `chunk_${sequenceId}`,
          documentHash: document.contentHash,
          sequenceId,
          text: text.slice(startChar, endChar),
          tokenCount: b - a,
          startChar,
          endChar,
        })
      );

      if (b >= tokens.length) break;
      a = b - chunkOverlapTokens;
    }

    return Object.freeze(chunks);
  }

  /**
   * Nearest split point at or before b that starts a paragraph or heading.
   * Stays above a + overlap so the next window still moves forward.
   */
  private findBoundary(text: string, tokens: TokenSpan[], a: number, b: number): number {
    const lowest = Math.max(a + this.config.chunkOverlapTokens + 1, b - this.config.boundarySearchTokens);
    for (let j = b; j >= lowest; j--) {
      if (this.startsBlock(text, tokens, j)) {
        return j;
      }
    }
    return b;
  }

  private startsBlock(text: string, tokens: TokenSpan[], index: number): boolean {
    const gap = text.slice(tokens[index - 1].end, tokens[index].start);
    if (BLANK_LINE.test(gap)) {
      return true;
    }
    if (!gap.includes('\n')) {
      return false;
    }
    const lineEnd = text.indexOf('\n', tokens[index].start);
    const line = text.slice(tokens[index].start, lineEnd === -1 ? text.length : lineEnd);
    return HEADING_LINE.test(line);
  }
}
