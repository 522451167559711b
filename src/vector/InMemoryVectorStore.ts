/**
 * In-memory vector store for tests and dry runs
 */

import type { UpsertOutcome } from '../stores/RelationalStore.js';
import type { VectorRecord, VectorSearchFilters, VectorSearchResult, VectorStore } from './VectorStore.js';

function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryVectorStore implements VectorStore {
  private readonly records = new Map<string, VectorRecord>();
  private pendingFailures = 0;
  private failure: Error = new Error('vector store unavailable');

  inserts = 0;
  updates = 0;
  writeAttempts = 0;

  /**
   * Make the next `count` upserts throw
   */
  failNextWrites(count: number, error?: Error): void {
    this.pendingFailures = count;
    if (error) {
      this.failure = error;
    }
  }

  async ensureSchema(): Promise<void> {}

  async upsert(record: VectorRecord): Promise<UpsertOutcome> {
    this.writeAttempts++;
    if (this.pendingFailures > 0) {
      this.pendingFailures--;
      throw this.failure;
    }

    const existing = this.records.get(record.id);
    if (
      existing &&
      existing.payload.contentHash === record.payload.contentHash &&
      existing.payload.model === record.payload.model &&
      existing.payload.aggregation === record.payload.aggregation
    ) {
      return 'unchanged';
    }

    this.records.set(record.id, structuredClone(record));
    if (existing) {
      this.updates++;
      return 'updated';
    }
    this.inserts++;
    return 'inserted';
  }

  async exists(id: string, contentHash?: string): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) {
      return false;
    }
    return contentHash === undefined || record.payload.contentHash === contentHash;
  }

  async search(vector: number[], topK: number, filters: VectorSearchFilters = {}): Promise<VectorSearchResult[]> {
    return [...this.records.values()]
      .filter((record) => filters.category === undefined || record.payload.category === filters.category)
      .filter((record) => filters.timePeriod === undefined || record.payload.timePeriod === filters.timePeriod)
      .map((record) => ({ id: record.id, score: cosineSimilarity(vector, record.vector), payload: { ...record.payload } }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }

  get(id: string): VectorRecord | undefined {
    const record = this.records.get(id);
    return record ? structuredClone(record) : undefined;
  }

  get size(): number {
    return this.records.size;
  }

  async close(): Promise<void> {}
}
