/**
 * Chunking Types
 */

export interface ChunkingConfig {
  chunkSizeTokens: number;       // Tokens per chunk
  chunkOverlapTokens: number;    // Tokens shared by consecutive chunks
  respectBoundaries: boolean;    // Prefer splits at paragraph or heading starts
  boundarySearchTokens: number;  // How far back a split may move
}

/**
 * Token position in the source text, as UTF-16 offsets [start, end)
 */
export interface TokenSpan {
  start: number;
  end: number;
}

export interface Chunk {
  id: string;              // chunk_<sequenceId>
  documentHash: string;
  sequenceId: number;
  text: string;
  tokenCount: number;
  startChar: number;
  endChar: number;
}

/**
 * What the chunker needs from a document
 */
export interface ChunkSource {
  contentHash: string;
  text: string;
}
