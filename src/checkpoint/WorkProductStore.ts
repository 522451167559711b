/**
 * WorkProductStore
 *
 * Intermediate results per document (clean text, metadata, sections, the
 * document vector) keyed by id and content hash. A resumed document picks up
 * from here instead of cleaning or embedding again. Losing this directory
 * only costs recomputation.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { writeFileAtomic } from '../cache/FileSystemContentCache.js';
import type { DocumentMetadata } from '../cleaning/documentMetadata.js';
import type { CleanedDocument } from '../cleaning/LegislationCleaner.js';
import type { DocumentEmbedding } from '../embeddings/DocumentEmbedder.js';
import { logger as rootLogger } from '../utils/logger.js';

const metadataSchema = z.object({
  title: z.string(),
  category: z.string(),
  time_period: z.string(),
  year: z.string(),
  document_number: z.string(),
  document_type: z.string(),
  enacted_date: z.string(),
  coming_into_force_date: z.string(),
  subtitle: z.string(),
  isbn: z.string(),
  extent: z.string(),
  embedding_quality: z.string(),
}) satisfies z.ZodType<DocumentMetadata>;

const workProductSchema = z.object({
  documentId: z.string(),
  contentHash: z.string(),
  cleaned: z.object({
    cleanText: z.string(),
    metadata: metadataSchema,
    sections: z.array(
      z.object({
        index: z.number().int(),
        sectionType: z.string(),
        number: z.string(),
        title: z.string(),
        content: z.string(),
      })
    ),
  }),
  embedding: z
    .object({
      vector: z.array(z.number()),
      chunkCount: z.number().int().nonnegative(),
      lowQuality: z.boolean(),
      model: z.string(),
      aggregation: z.string(),
    })
    .nullable(),
});

export interface WorkProduct {
  documentId: string;
  contentHash: string;
  cleaned: CleanedDocument;
  embedding: DocumentEmbedding | null;
}

export interface WorkProductStore {
  /**
   * Work product for a document, only if it was produced from `contentHash`
   */
  load(documentId: string, contentHash: string): Promise<WorkProduct | null>;
  save(product: WorkProduct): Promise<void>;
  /**
   * Keep raw bytes of a document that could not be cleaned
   */
  saveRejected(documentId: string, bytes: Buffer): Promise<void>;
}

export class FileWorkProductStore implements WorkProductStore {
  private readonly log: Logger;

  constructor(
    private readonly directory: string,
    logger?: Logger
  ) {
    this.log = logger ?? rootLogger.child({ component: 'work-products' });
  }

  private pathFor(documentId: string, suffix: string): string {
    return join(this.directory, documentId.slice(0, 2), `${documentId}${suffix}`);
  }

  async load(documentId: string, contentHash: string): Promise<WorkProduct | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.pathFor(documentId, '.json'), 'utf8');
    } catch (error) {
      if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.log.warn({ documentId, error }, 'Discarding unreadable work product');
      return null;
    }
    const parsed = workProductSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn({ documentId }, 'Discarding work product that failed validation');
      return null;
    }
    if (parsed.data.documentId !== documentId || parsed.data.contentHash !== contentHash) {
      return null;
    }
    return parsed.data;
  }

  async save(product: WorkProduct): Promise<void> {
    const path = this.pathFor(product.documentId, '.json');
    await fs.mkdir(join(this.directory, product.documentId.slice(0, 2)), { recursive: true });
    await writeFileAtomic(path, JSON.stringify(product));
  }

  async saveRejected(documentId: string, bytes: Buffer): Promise<void> {
    await fs.mkdir(join(this.directory, documentId.slice(0, 2)), { recursive: true });
    await writeFileAtomic(this.pathFor(documentId, '.rejected.html'), bytes);
  }
}

export class InMemoryWorkProductStore implements WorkProductStore {
  readonly products = new Map<string, WorkProduct>();
  readonly rejected = new Map<string, Buffer>();

  async load(documentId: string, contentHash: string): Promise<WorkProduct | null> {
    const product = this.products.get(documentId);
    return product && product.contentHash === contentHash ? structuredClone(product) : null;
  }

  async save(product: WorkProduct): Promise<void> {
    this.products.set(product.documentId, structuredClone(product));
  }

  async saveRejected(documentId: string, bytes: Buffer): Promise<void> {
    this.rejected.set(documentId, Buffer.from(bytes));
  }
}

