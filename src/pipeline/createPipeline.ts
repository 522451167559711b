/**
 * Production wiring: filesystem state, axios fetcher, local embedding model
 * and the two PostgreSQL-backed stores
 */

import { join } from 'path';
import type { Logger } from 'pino';
import type { PipelineConfig } from '../config/pipelineConfig.js';
import { createPostgresPool, testPostgresConnection } from '../config/postgres.js';
import { FileSystemContentCache } from '../cache/FileSystemContentCache.js';
import { CheckpointManager } from '../checkpoint/CheckpointManager.js';
import { FileCheckpointStore } from '../checkpoint/FileCheckpointStore.js';
import { FileWorkProductStore } from '../checkpoint/WorkProductStore.js';
import { ParagraphChunkingStrategy } from '../chunking/ParagraphChunkingStrategy.js';
import { DocumentEmbedder } from '../embeddings/DocumentEmbedder.js';
import { getAggregationPolicy } from '../embeddings/aggregation.js';
import { LocalEmbeddingProvider } from '../embeddings/providers/LocalEmbeddingProvider.js';
import { LegislationExtractor } from '../extraction/LegislationExtractor.js';
import { LegislationListingParser } from '../extraction/ListingParser.js';
import { AxiosPageFetcher } from '../extraction/PageFetcher.js';
import { DualLoader } from '../loaders/DualLoader.js';
import { PostgresRelationalStore } from '../stores/PostgresRelationalStore.js';
import { PgVectorStore } from '../vector/PgVectorStore.js';
import { RequestRateLimiter } from '../utils/rateLimiter.js';
import { DEFAULT_TIMEOUTS } from '../utils/withTimeout.js';
import { logger as rootLogger } from '../utils/logger.js';
import { PipelineOrchestrator } from './PipelineOrchestrator.js';

export interface PipelineHandle {
  orchestrator: PipelineOrchestrator;
  checkpoint: CheckpointManager;
  /** Close both database pools */
  close(): Promise<void>;
}

/**
 * Build every collaborator for a run and check that both databases answer
 *
 * @throws StoreConnectionError
 */
export async function createPipeline(
  config: PipelineConfig,
  options: { reset?: boolean; skipRepair?: boolean; logger?: Logger } = {}
): Promise<PipelineHandle> {
  const log = options.logger ?? rootLogger;
  const scope = { category: config.crawl.category, timePeriod: config.crawl.timePeriod };

  const relationalPool = createPostgresPool('relational', config.relational, log);
  const vectorPool = createPostgresPool('vector', config.vector.pool, log);
  const close = async () => {
    await Promise.allSettled([relationalPool.end(), vectorPool.end()]);
  };

  try {
    await testPostgresConnection('relational', relationalPool, DEFAULT_TIMEOUTS.SCHEMA_SETUP, log);
    await testPostgresConnection('vector', vectorPool, DEFAULT_TIMEOUTS.SCHEMA_SETUP, log);
  } catch (error) {
    await close();
    throw error;
  }

  const relational = new PostgresRelationalStore(relationalPool, log);
  const vector = new PgVectorStore(
    vectorPool,
    { schema: config.vector.schema, table: config.vector.table, dimensions: config.embedding.dimensions },
    log
  );

  const extractor = new LegislationExtractor(
    {
      baseUrl: config.crawl.baseUrl,
      requestTimeoutMs: config.crawl.requestTimeoutMs,
      fetchMaxRetries: config.crawl.fetchMaxRetries,
      maxListingPages: config.crawl.maxListingPages,
      documentMaxAgeMs: config.cache.documentMaxAgeMs,
      listingMaxAgeMs: config.cache.listingMaxAgeMs,
    },
    {
      fetcher: new AxiosPageFetcher({ userAgent: config.crawl.userAgent, timeoutMs: config.crawl.requestTimeoutMs }),
      cache: new FileSystemContentCache(config.cache.dir),
      parser: new LegislationListingParser(),
      rateLimiter: new RequestRateLimiter(config.crawl.requestDelayMs),
      logger: log.child({ component: 'extractor' }),
    }
  );

  const embedder = new DocumentEmbedder(
    new LocalEmbeddingProvider(config.embedding.model, config.embedding.dimensions),
    new ParagraphChunkingStrategy({
      maxChars: config.embedding.chunkMaxChars,
      overlapChars: config.embedding.chunkOverlapChars,
    }),
    getAggregationPolicy(config.embedding.aggregation),
    {
      dimensions: config.embedding.dimensions,
      batchSize: config.embedding.batchSize,
      maxRetries: config.embedding.maxRetries,
    },
    { logger: log.child({ component: 'embedder' }) }
  );

  const checkpoint = new CheckpointManager(new FileCheckpointStore(config.state.checkpointDir, log), scope, {
    logger: log.child({ component: 'checkpoint' }),
  });

  const orchestrator = new PipelineOrchestrator(
    {
      extractor,
      embedder,
      loader: new DualLoader(relational, vector, config.stores, { logger: log.child({ component: 'DualLoader' }) }),
      relational,
      vector,
      checkpoint,
      workProducts: new FileWorkProductStore(join(config.state.workDir, 'documents'), log),
      logger: log.child({ component: 'PipelineOrchestrator' }),
    },
    {
      workers: config.workers,
      maxItems: config.crawl.maxItems,
      repairGracePeriodMs: config.stores.repairGracePeriodMs,
      readTimeoutMs: config.stores.writeTimeoutMs,
      skipRepair: options.skipRepair,
      reset: options.reset,
    }
  );

  return { orchestrator, checkpoint, close };
}
