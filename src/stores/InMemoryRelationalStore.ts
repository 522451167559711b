/**
 * In-memory relational store for tests and dry runs
 */

import type { LegislationRecord, RelationalStore, StoredLegislation, UpsertOutcome } from './RelationalStore.js';

export class InMemoryRelationalStore implements RelationalStore {
  private readonly rows = new Map<string, { record: LegislationRecord; updatedAt: Date }>();
  private pendingFailures = 0;
  private failure: Error = new Error('relational store unavailable');

  /** Writes that created a row */
  inserts = 0;
  /** Writes that replaced a row */
  updates = 0;
  /** Every upsert call, including unchanged and failed ones */
  writeAttempts = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

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

  async upsertDocument(record: LegislationRecord): Promise<UpsertOutcome> {
    this.writeAttempts++;
    if (this.pendingFailures > 0) {
      this.pendingFailures--;
      throw this.failure;
    }

    const existing = this.rows.get(record.id);
    if (existing && existing.record.contentHash === record.contentHash) {
      return 'unchanged';
    }

    this.rows.set(record.id, { record: structuredClone(record), updatedAt: this.now() });
    if (existing) {
      this.updates++;
      return 'updated';
    }
    this.inserts++;
    return 'inserted';
  }

  async findById(id: string): Promise<StoredLegislation | null> {
    const row = this.rows.get(id);
    if (!row) {
      return null;
    }
    const { sections, ...rest } = structuredClone(row.record);
    return { ...rest, sectionCount: sections.length, updatedAt: row.updatedAt };
  }

  get size(): number {
    return this.rows.size;
  }

  ids(): string[] {
    return [...this.rows.keys()];
  }

  async close(): Promise<void> {}
}
