/**
 * PostgresRelationalStore - legislation rows and sections in PostgreSQL
 *
 * The upsert only rewrites a row when the content hash differs, so a re-run
 * over unchanged documents changes nothing in the database.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { logger as rootLogger } from '../utils/logger.js';
import type { SqlPool } from '../config/postgres.js';
import { UNKNOWN, emptyMetadata, METADATA_KEYS, type DocumentMetadata } from '../cleaning/documentMetadata.js';
import type { LegislationRecord, RelationalStore, StoredLegislation, UpsertOutcome } from './RelationalStore.js';

const upsertRowSchema = z.object({ inserted: z.boolean() });

const storedRowSchema = z.object({
  id: z.string(),
  source_url: z.string(),
  category: z.string(),
  time_period: z.string(),
  content_hash: z.string(),
  title: z.string(),
  clean_text: z.string(),
  metadata: z.record(z.unknown()),
  section_count: z.coerce.number().int(),
  updated_at: z.coerce.date(),
});

/**
 * Rebuild a full metadata map from a stored JSONB value; keys that are absent
 * or not strings read as "unknown"
 */
export function metadataFromJson(value: Record<string, unknown>): DocumentMetadata {
  const metadata = emptyMetadata();
  for (const key of METADATA_KEYS) {
    const raw = value[key];
    metadata[key] = typeof raw === 'string' && raw.length > 0 ? raw : UNKNOWN;
  }
  return metadata;
}

export class PostgresRelationalStore implements RelationalStore {
  private schemaEnsured = false;
  private readonly log: Logger;

  constructor(
    private readonly pool: SqlPool,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ component: 'PostgresRelationalStore' });
  }

  async ensureSchema(): Promise<void> {
    if (this.schemaEnsured) {
      return;
    }

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS legislation (
        id TEXT PRIMARY KEY,
        source_url TEXT NOT NULL,
        category TEXT NOT NULL,
        time_period TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        title TEXT NOT NULL,
        clean_text TEXT NOT NULL,
        metadata JSONB NOT NULL,
        created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
      );
    `);

    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_legislation_category_period
        ON legislation
        USING BTREE (category, time_period);
    `);

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS legislation_sections (
        legislation_id TEXT NOT NULL REFERENCES legislation (id) ON DELETE CASCADE,
        section_index INTEGER NOT NULL,
        section_type TEXT NOT NULL,
        section_number TEXT NOT NULL,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        PRIMARY KEY (legislation_id, section_index)
      );
    `);

    this.schemaEnsured = true;
    this.log.info('Relational schema ensured');
  }

  /**
   * Insert or update one document and replace its sections, in one transaction
   */
  async upsertDocument(record: LegislationRecord): Promise<UpsertOutcome> {
    await this.ensureSchema();
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');

      const result = await client.query(
        `
        INSERT INTO legislation (
          id, source_url, category, time_period, content_hash, title, clean_text, metadata
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb)
        ON CONFLICT (id) DO UPDATE SET
          source_url = EXCLUDED.source_url,
          category = EXCLUDED.category,
          time_period = EXCLUDED.time_period,
          content_hash = EXCLUDED.content_hash,
          title = EXCLUDED.title,
          clean_text = EXCLUDED.clean_text,
          metadata = EXCLUDED.metadata,
          updated_at = NOW()
        WHERE legislation.content_hash IS DISTINCT FROM EXCLUDED.content_hash
        RETURNING (xmax = 0) AS inserted
        `,
        [
          record.id,
          record.sourceUrl,
          record.category,
          record.timePeriod,
          record.contentHash,
          record.title,
          record.cleanText,
          JSON.stringify(record.metadata),
        ]
      );

      const row = result.rows[0];
      if (row === undefined) {
        // Conflict with an identical hash: nothing to write
        await client.query('COMMIT');
        return 'unchanged';
      }
      const { inserted } = upsertRowSchema.parse(row);

      await client.query('DELETE FROM legislation_sections WHERE legislation_id = $1', [record.id]);
      for (const section of record.sections) {
        await client.query(
          `
          INSERT INTO legislation_sections (
            legislation_id, section_index, section_type, section_number, title, content
          )
          VALUES ($1, $2, $3, $4, $5, $6)
          `,
          [record.id, section.index, section.sectionType, section.number, section.title, section.content]
        );
      }

      await client.query('COMMIT');
      this.log.debug(
        { documentId: record.id, inserted, sections: record.sections.length },
        'Upserted legislation row'
      );
      return inserted ? 'inserted' : 'updated';
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.log.warn({ error: rollbackError, documentId: record.id }, 'Rollback failed');
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async findById(id: string): Promise<StoredLegislation | null> {
    await this.ensureSchema();
    const result = await this.pool.query(
      `
      SELECT l.id, l.source_url, l.category, l.time_period, l.content_hash, l.title,
             l.clean_text, l.metadata, l.updated_at,
             (SELECT COUNT(*) FROM legislation_sections s WHERE s.legislation_id = l.id) AS section_count
      FROM legislation l
      WHERE l.id = $1
      `,
      [id]
    );

    const row = result.rows[0];
    if (row === undefined) {
      return null;
    }
    const parsed = storedRowSchema.parse(row);
    return {
      id: parsed.id,
      sourceUrl: parsed.source_url,
      category: parsed.category,
      timePeriod: parsed.time_period,
      contentHash: parsed.content_hash,
      title: parsed.title,
      cleanText: parsed.clean_text,
      metadata: metadataFromJson(parsed.metadata),
      sectionCount: parsed.section_count,
      updatedAt: parsed.updated_at,
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
