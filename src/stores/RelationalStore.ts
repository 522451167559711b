/**
 * Relational store contract
 *
 * One row per document keyed by document id, plus its sections. Writes are
 * keyed upserts: rewriting a document with the same content hash leaves the
 * stored row untouched.
 */

import type { DocumentMetadata, DocumentSection } from '../cleaning/documentMetadata.js';

export interface LegislationRecord {
  id: string;
  sourceUrl: string;
  category: string;
  timePeriod: string;
  contentHash: string;
  title: string;
  cleanText: string;
  metadata: DocumentMetadata;
  sections: DocumentSection[];
}

export interface StoredLegislation extends Omit<LegislationRecord, 'sections'> {
  sectionCount: number;
  updatedAt: Date;
}

export type UpsertOutcome = 'inserted' | 'updated' | 'unchanged';

export interface RelationalStore {
  ensureSchema(): Promise<void>;
  upsertDocument(record: LegislationRecord): Promise<UpsertOutcome>;
  findById(id: string): Promise<StoredLegislation | null>;
  close(): Promise<void>;
}
