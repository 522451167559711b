/**
 * Vector store contract
 *
 * One vector per document, keyed by document id, with the payload used for
 * filtered search and for telling whether a stored vector is current.
 */

import type { UpsertOutcome } from '../stores/RelationalStore.js';

export interface VectorPayload {
  category: string;
  timePeriod: string;
  contentHash: string;
  model: string;
  aggregation: string;
  /** Zero-vector sentinel for a document without text */
  lowQuality: boolean;
}

export interface VectorRecord {
  id: string;
  vector: number[];
  payload: VectorPayload;
}

export interface VectorSearchFilters {
  category?: string;
  timePeriod?: string;
}

export interface VectorSearchResult {
  id: string;
  /** Cosine similarity */
  score: number;
  payload: VectorPayload;
}

export interface VectorStore {
  ensureSchema(): Promise<void>;
  upsert(record: VectorRecord): Promise<UpsertOutcome>;
  /**
   * Whether a vector is stored for `id`; with `contentHash`, only when it was
   * computed from that content
   */
  exists(id: string, contentHash?: string): Promise<boolean>;
  search(vector: number[], topK: number, filters?: VectorSearchFilters): Promise<VectorSearchResult[]>;
  close(): Promise<void>;
}
