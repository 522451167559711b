/**
 * PgVectorStore - pgvector implementation of VectorStore
 *
 * Document vectors live in a single table keyed by document id. Rows are only
 * rewritten when the content hash, model or aggregation changed.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { logger as rootLogger } from '../utils/logger.js';
import type { SqlPool } from '../config/postgres.js';
import type { UpsertOutcome } from '../stores/RelationalStore.js';
import type { VectorRecord, VectorSearchFilters, VectorSearchResult, VectorStore } from './VectorStore.js';

export interface PgVectorStoreConfig {
  schema: string;
  table: string;
  dimensions: number;
  /** HNSW parameters */
  hnswM?: number;
  hnswEfConstruction?: number;
}

const IDENTIFIER = /^[a-z0-9_]+$/i;

const upsertRowSchema = z.object({ inserted: z.boolean() });
const existsRowSchema = z.object({ content_hash: z.string() });
const searchRowSchema = z.object({
  document_id: z.string(),
  category: z.string(),
  time_period: z.string(),
  content_hash: z.string(),
  model_id: z.string(),
  aggregation: z.string(),
  low_quality: z.boolean(),
  score: z.coerce.number(),
});

/**
 * Escape identifier (schema/table name)
 *
 * Doubles double quotes and wraps in double quotes.
 */
function escapeIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

export class PgVectorStore implements VectorStore {
  private readonly tableRef: string;
  private readonly log: Logger;
  private schemaEnsured = false;

  constructor(
    private readonly pool: SqlPool,
    private readonly config: PgVectorStoreConfig,
    logger: Logger = rootLogger
  ) {
    for (const name of [config.schema, config.table]) {
      if (!IDENTIFIER.test(name)) {
        throw new Error(`Invalid identifier: ${name}. Only alphanumeric characters and underscores are allowed.`);
      }
    }
    if (!Number.isInteger(config.dimensions) || config.dimensions <= 0) {
      throw new Error(`Invalid vector dimensions: ${config.dimensions}`);
    }
    this.tableRef = `${escapeIdentifier(config.schema)}.${escapeIdentifier(config.table)}`;
    this.log = logger.child({ component: 'PgVectorStore', table: `${config.schema}.${config.table}` });
  }

  async ensureSchema(): Promise<void> {
    if (this.schemaEnsured) {
      return;
    }
    const { schema, table, dimensions } = this.config;
    const m = this.config.hnswM ?? 16;
    const efConstruction = this.config.hnswEfConstruction ?? 64;

    await this.pool.query('CREATE EXTENSION IF NOT EXISTS vector');
    await this.pool.query(`CREATE SCHEMA IF NOT EXISTS ${escapeIdentifier(schema)}`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.tableRef} (
        document_id TEXT PRIMARY KEY,
        embedding vector(${dimensions}) NOT NULL,
        dims INTEGER NOT NULL,
        model_id TEXT NOT NULL,
        aggregation TEXT NOT NULL,
        category TEXT NOT NULL,
        time_period TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        low_quality BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
      );
    `);
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS ${escapeIdentifier(`idx_${table}_category_period`)}
        ON ${this.tableRef}
        USING BTREE (category, time_period);
    `);
    // WITH clause does not take parameters
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS ${escapeIdentifier(`idx_${table}_embedding_hnsw`)}
        ON ${this.tableRef}
        USING hnsw (embedding vector_cosine_ops)
        WITH (m = ${m}, ef_construction = ${efConstruction});
    `);

    this.schemaEnsured = true;
    this.log.info({ dimensions }, 'pgvector schema ensured');
  }

  async upsert(record: VectorRecord): Promise<UpsertOutcome> {
    if (record.vector.length !== this.config.dimensions) {
      throw new Error(`Embedding dimension mismatch: expected ${this.config.dimensions}, got ${record.vector.length}`);
    }
    await this.ensureSchema();

    // pgvector takes the '[1,2,3]' text form; pg would send a JS array as {1,2,3}
    const vectorJson = JSON.stringify(record.vector);
    const { payload } = record;

    const result = await this.pool.query(
      `
      INSERT INTO ${this.tableRef} AS t (
        document_id, embedding, dims, model_id, aggregation,
        category, time_period, content_hash, low_quality
      )
      VALUES ($1, $2::text::vector, $3, $4, $5, $6, $7, $8, $9)
      ON CONFLICT (document_id) DO UPDATE SET
        embedding = EXCLUDED.embedding,
        dims = EXCLUDED.dims,
        model_id = EXCLUDED.model_id,
        aggregation = EXCLUDED.aggregation,
        category = EXCLUDED.category,
        time_period = EXCLUDED.time_period,
        content_hash = EXCLUDED.content_hash,
        low_quality = EXCLUDED.low_quality,
        updated_at = NOW()
      WHERE t.content_hash IS DISTINCT FROM EXCLUDED.content_hash
         OR t.model_id IS DISTINCT FROM EXCLUDED.model_id
         OR t.aggregation IS DISTINCT FROM EXCLUDED.aggregation
      RETURNING (xmax = 0) AS inserted
      `,
      [
        record.id,
        vectorJson,
        record.vector.length,
        payload.model,
        payload.aggregation,
        payload.category,
        payload.timePeriod,
        payload.contentHash,
        payload.lowQuality,
      ]
    );

    const row = result.rows[0];
    if (row === undefined) {
      return 'unchanged';
    }
    const { inserted } = upsertRowSchema.parse(row);
    this.log.debug({ documentId: record.id, inserted }, 'Upserted document vector');
    return inserted ? 'inserted' : 'updated';
  }

  async exists(id: string, contentHash?: string): Promise<boolean> {
    await this.ensureSchema();
    const result = await this.pool.query(`SELECT content_hash FROM ${this.tableRef} WHERE document_id = $1`, [id]);
    const row = result.rows[0];
    if (row === undefined) {
      return false;
    }
    return contentHash === undefined || existsRowSchema.parse(row).content_hash === contentHash;
  }

  /**
   * Cosine similarity search (1 - cosine distance), optionally filtered by
   * category and time period
   */
  async search(vector: number[], topK: number, filters: VectorSearchFilters = {}): Promise<VectorSearchResult[]> {
    await this.ensureSchema();
    const result = await this.pool.query(
      `
      SELECT document_id, category, time_period, content_hash, model_id, aggregation, low_quality,
             1 - (embedding <=> CAST($1::text AS vector)) AS score
      FROM ${this.tableRef}
      WHERE ($2::text IS NULL OR category = $2)
        AND ($3::text IS NULL OR time_period = $3)
      ORDER BY embedding <=> CAST($1::text AS vector)
      LIMIT $4
      `,
      [JSON.stringify(vector), filters.category ?? null, filters.timePeriod ?? null, topK]
    );

    return result.rows.map((raw) => {
      const row = searchRowSchema.parse(raw);
      return {
        id: row.document_id,
        score: row.score,
        payload: {
          category: row.category,
          timePeriod: row.time_period,
          contentHash: row.content_hash,
          model: row.model_id,
          aggregation: row.aggregation,
          lowQuality: row.low_quality,
        },
      };
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
