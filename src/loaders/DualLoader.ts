/**
 * DualLoader - writes one document to the relational store, then the vector store
 *
 * The relational row is the source of truth and is written first; the vector
 * is a derived index. Each write is confirmed before onStage is called, so the
 * checkpoint can never claim a write that did not land. A document whose
 * vector write fails stays at SqlLoaded and only needs the vector write later.
 */

import type { Logger } from 'pino';
import type { CleanedDocument } from '../cleaning/LegislationCleaner.js';
import type { DocumentEmbedding } from '../embeddings/DocumentEmbedder.js';
import type { LegislationRecord, RelationalStore, UpsertOutcome } from '../stores/RelationalStore.js';
import type { VectorRecord, VectorStore } from '../vector/VectorStore.js';
import { hasReached, type ProgressStage } from '../pipeline/stages.js';
import { createRetryPolicy, retryWithBackoff, RetryExhaustedError, type RetryPolicy } from '../utils/retry.js';
import { withTimeout } from '../utils/withTimeout.js';
import { PipelineCancelledError, StoreWriteError, type StoreName } from '../utils/pipelineErrors.js';
import { logger as rootLogger } from '../utils/logger.js';

export interface LoadableDocument {
  id: string;
  sourceUrl: string;
  category: string;
  timePeriod: string;
  contentHash: string;
  /** Stage already reached; at SqlLoaded only the vector write is left */
  stage: ProgressStage;
  cleaned: CleanedDocument;
  embedding: DocumentEmbedding;
}

export type WriteOutcome = 'written' | 'unchanged' | 'skipped' | 'failed';

export interface LoadResult {
  relational: WriteOutcome;
  vector: WriteOutcome;
  /** Stage the document reached */
  stage: ProgressStage;
  error?: StoreWriteError;
}

/**
 * Called after each durable write, before the next one starts
 */
export type LoadStageCallback = (stage: 'SqlLoaded' | 'VectorLoaded') => Promise<void>;

export interface DualLoaderConfig {
  writeTimeoutMs: number;
  maxRetries: number;
}

export function toLegislationRecord(doc: Omit<LoadableDocument, 'stage'>): LegislationRecord {
  return {
    id: doc.id,
    sourceUrl: doc.sourceUrl,
    category: doc.category,
    timePeriod: doc.timePeriod,
    contentHash: doc.contentHash,
    title: doc.cleaned.metadata.title,
    cleanText: doc.cleaned.cleanText,
    metadata: { ...doc.cleaned.metadata, embedding_quality: doc.embedding.lowQuality ? 'low' : 'ok' },
    sections: doc.cleaned.sections,
  };
}

export function toVectorRecord(doc: {
  id: string;
  category: string;
  timePeriod: string;
  contentHash: string;
  embedding: DocumentEmbedding;
}): VectorRecord {
  return {
    id: doc.id,
    vector: doc.embedding.vector,
    payload: {
      category: doc.category,
      timePeriod: doc.timePeriod,
      contentHash: doc.contentHash,
      model: doc.embedding.model,
      aggregation: doc.embedding.aggregation,
      lowQuality: doc.embedding.lowQuality,
    },
  };
}

function writeOutcome(outcome: UpsertOutcome): WriteOutcome {
  return outcome === 'unchanged' ? 'unchanged' : 'written';
}

export class DualLoader {
  private readonly retryPolicy: RetryPolicy;
  private readonly log: Logger;

  constructor(
    private readonly relational: RelationalStore,
    private readonly vector: VectorStore,
    private readonly config: DualLoaderConfig,
    options: { retryPolicy?: Partial<RetryPolicy>; logger?: Logger } = {}
  ) {
    this.retryPolicy = createRetryPolicy({
      maxAttempts: config.maxRetries + 1,
      // Store errors are opaque driver errors; every one gets the bounded retry
      isRetryable: () => true,
      ...options.retryPolicy,
    });
    this.log = options.logger ?? rootLogger.child({ component: 'DualLoader' });
  }

  /**
   * Relational write, then vector write
   *
   * Store failures are returned in the result, never thrown.
   *
   * @throws PipelineCancelledError
   */
  async load(doc: LoadableDocument, onStage: LoadStageCallback, signal?: AbortSignal): Promise<LoadResult> {
    let relational: WriteOutcome = 'skipped';

    if (!hasReached(doc.stage, 'SqlLoaded')) {
      try {
        relational = writeOutcome(await this.writeRelational(toLegislationRecord(doc), signal));
      } catch (error) {
        if (error instanceof StoreWriteError) {
          return { relational: 'failed', vector: 'skipped', stage: doc.stage, error };
        }
        throw error;
      }
      await onStage('SqlLoaded');
    }

    let vector: WriteOutcome;
    try {
      vector = writeOutcome(await this.writeVector(toVectorRecord(doc), signal));
    } catch (error) {
      if (error instanceof StoreWriteError) {
        this.log.warn(
          { documentId: doc.id, error: error.message },
          'Vector write failed, document left at SqlLoaded for repair'
        );
        return { relational, vector: 'failed', stage: 'SqlLoaded', error };
      }
      throw error;
    }
    await onStage('VectorLoaded');

    return { relational, vector, stage: 'VectorLoaded' };
  }

  /**
   * @throws StoreWriteError after the retry policy is spent
   */
  writeRelational(record: LegislationRecord, signal?: AbortSignal): Promise<UpsertOutcome> {
    return this.storeCall('relational', record.id, () => this.relational.upsertDocument(record), signal);
  }

  /**
   * @throws StoreWriteError after the retry policy is spent
   */
  writeVector(record: VectorRecord, signal?: AbortSignal): Promise<UpsertOutcome> {
    return this.storeCall('vector', record.id, () => this.vector.upsert(record), signal);
  }

  /**
   * @throws StoreWriteError when the lookup keeps failing
   */
  vectorExists(id: string, contentHash: string, signal?: AbortSignal): Promise<boolean> {
    return this.storeCall('vector', id, () => this.vector.exists(id, contentHash), signal);
  }

  private async storeCall<T>(
    store: StoreName,
    documentId: string,
    operation: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    try {
      return await retryWithBackoff(
        () => withTimeout(operation(), this.config.writeTimeoutMs, `${store} store write for ${documentId}`),
        this.retryPolicy,
        { context: `${store} ${documentId}`, signal, logger: this.log }
      );
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        throw error;
      }
      throw new StoreWriteError(store, documentId, error instanceof RetryExhaustedError ? error.lastError : error);
    }
  }
}
