/**
 * ChunkingStrategy - splits clean text into pieces the embedding model accepts
 */

export interface ChunkingConfig {
  /** Hard upper bound for a chunk, in characters */
  maxChars: number;
  /** Characters shared between consecutive chunks */
  overlapChars: number;
}

export interface ChunkingStrategy {
  getName(): string;
  chunk(text: string): string[];
}
