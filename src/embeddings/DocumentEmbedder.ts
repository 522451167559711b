/**
 * DocumentEmbedder - one vector per document
 *
 * Chunks clean text, embeds the chunks in batches with retry, and folds the
 * chunk vectors into a document vector with the configured aggregation policy.
 */

import type { Logger } from 'pino';
import type { EmbeddingProvider } from './EmbeddingProvider.js';
import type { AggregationPolicy } from './aggregation.js';
import type { ChunkingStrategy } from '../chunking/ChunkingStrategy.js';
import { createRetryPolicy, retryWithBackoff, RetryExhaustedError } from '../utils/retry.js';
import type { RetryPolicy } from '../utils/retry.js';
import { withTimeout, DEFAULT_TIMEOUTS } from '../utils/withTimeout.js';
import { EmbeddingExhaustedError, PipelineCancelledError } from '../utils/pipelineErrors.js';
import { logger as rootLogger } from '../utils/logger.js';

export interface DocumentEmbedding {
  vector: number[];
  chunkCount: number;
  /** Set when the text produced no chunks and the vector is the zero sentinel */
  lowQuality: boolean;
  model: string;
  aggregation: string;
}

export interface DocumentEmbedderConfig {
  dimensions: number;
  batchSize: number;
  maxRetries: number;
  batchTimeoutMs?: number;
}

/**
 * A provider returned vectors of the wrong size; retrying will not help
 */
export class EmbeddingDimensionError extends Error {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Embedding dimension mismatch: expected ${expected}, got ${actual}`);
    this.name = 'EmbeddingDimensionError';
  }
}

/**
 * Zero vector used for documents without any text to embed
 */
export function zeroVector(dims: number): number[] {
  return new Array<number>(dims).fill(0);
}

export class DocumentEmbedder {
  private readonly retryPolicy: RetryPolicy;
  private readonly log: Logger;
  readonly stats = { providerCalls: 0, documentsEmbedded: 0 };

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly chunker: ChunkingStrategy,
    private readonly aggregation: AggregationPolicy,
    private readonly config: DocumentEmbedderConfig,
    options: { retryPolicy?: Partial<RetryPolicy>; logger?: Logger } = {}
  ) {
    if (provider.getDims() !== config.dimensions) {
      throw new EmbeddingDimensionError(config.dimensions, provider.getDims());
    }
    this.retryPolicy = createRetryPolicy({
      maxAttempts: config.maxRetries + 1,
      isRetryable: (error) => !(error instanceof EmbeddingDimensionError),
      ...options.retryPolicy,
    });
    this.log = options.logger ?? rootLogger.child({ component: 'embedder' });
  }

  /**
   * Embed a document's clean text
   *
   * @throws EmbeddingExhaustedError
   * @throws PipelineCancelledError
   */
  async embed(cleanText: string, options: { documentId: string; signal?: AbortSignal }): Promise<DocumentEmbedding> {
    const { documentId, signal } = options;
    const dims = this.config.dimensions;
    const chunks = this.chunker.chunk(cleanText);

    if (chunks.length === 0) {
      this.log.warn({ documentId }, 'No text to embed, storing zero vector');
      return {
        vector: zeroVector(dims),
        chunkCount: 0,
        lowQuality: true,
        model: this.provider.getName(),
        aggregation: this.aggregation.name,
      };
    }

    const chunkVectors: number[][] = [];
    for (let start = 0; start < chunks.length; start += this.config.batchSize) {
      const batch = chunks.slice(start, start + this.config.batchSize);
      chunkVectors.push(...(await this.embedBatch(batch, documentId, signal)));
    }

    this.stats.documentsEmbedded++;
    this.log.debug({ documentId, chunkCount: chunks.length }, 'Embedded document');

    return {
      vector: this.aggregation.aggregate(chunkVectors, dims),
      chunkCount: chunks.length,
      lowQuality: false,
      model: this.provider.getName(),
      aggregation: this.aggregation.name,
    };
  }

  private async embedBatch(batch: string[], documentId: string, signal?: AbortSignal): Promise<number[][]> {
    try {
      return await retryWithBackoff(
        async () => {
          this.stats.providerCalls++;
          const vectors = await withTimeout(
            this.provider.generateEmbeddings(batch),
            this.config.batchTimeoutMs ?? DEFAULT_TIMEOUTS.EMBEDDING_BATCH,
            `Embedding batch for ${documentId}`
          );
          if (vectors.length !== batch.length) {
            throw new Error(`Provider returned ${vectors.length} vectors for ${batch.length} chunks`);
          }
          for (const vector of vectors) {
            if (vector.length !== this.config.dimensions) {
              throw new EmbeddingDimensionError(this.config.dimensions, vector.length);
            }
          }
          return vectors;
        },
        this.retryPolicy,
        { context: `embed ${documentId}`, signal, logger: this.log }
      );
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        throw error;
      }
      if (error instanceof RetryExhaustedError) {
        throw new EmbeddingExhaustedError(documentId, error.attempts, error.lastError);
      }
      throw new EmbeddingExhaustedError(documentId, 1, error);
    }
  }
}
