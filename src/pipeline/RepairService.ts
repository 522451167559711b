/**
 * RepairService - finishes documents left at SqlLoaded
 *
 * A document at SqlLoaded has its relational row but no current vector. The
 * repair pass runs before new work and retries only the vector write, using
 * the embedding kept in the work product store. Nothing is fetched, and the
 * text is only re-embedded when the work product is gone.
 */

import type { Logger } from 'pino';
import type { CheckpointManager } from '../checkpoint/CheckpointManager.js';
import type { DocumentProgress } from '../checkpoint/checkpointSchema.js';
import type { WorkProductStore } from '../checkpoint/WorkProductStore.js';
import type { DocumentEmbedder, DocumentEmbedding } from '../embeddings/DocumentEmbedder.js';
import { toVectorRecord, type DualLoader } from '../loaders/DualLoader.js';
import type { RelationalStore, StoredLegislation } from '../stores/RelationalStore.js';
import { withTimeout } from '../utils/withTimeout.js';
import {
  PipelineCancelledError,
  StoreWriteError,
  errorMessage,
  isCancellation,
  toFailureKind,
} from '../utils/pipelineErrors.js';
import { logger as rootLogger } from '../utils/logger.js';

export interface RepairReport {
  /** SqlLoaded documents past the grace period */
  candidates: number;
  /** Vector written by this pass */
  repaired: number;
  /** Vector was already stored with the current hash */
  alreadyPresent: number;
  reembedded: number;
  failed: number;
}

export interface RepairDependencies {
  checkpoint: CheckpointManager;
  loader: DualLoader;
  workProducts: WorkProductStore;
  relational: RelationalStore;
  embedder: DocumentEmbedder;
  gracePeriodMs: number;
  readTimeoutMs: number;
  now?: () => Date;
  logger?: Logger;
}

export class RepairService {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: RepairDependencies) {
    this.log = deps.logger ?? rootLogger.child({ component: 'RepairService' });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * SqlLoaded documents whose last stage change is older than the grace period
   */
  candidates(): DocumentProgress[] {
    const cutoff = this.now().getTime() - this.deps.gracePeriodMs;
    return Object.values(this.deps.checkpoint.current.documents).filter(
      (doc) => doc.stage === 'SqlLoaded' && Date.parse(doc.stageUpdatedAt) <= cutoff
    );
  }

  /**
   * @throws PipelineCancelledError
   */
  async run(signal?: AbortSignal): Promise<RepairReport> {
    const candidates = this.candidates();
    const report: RepairReport = { candidates: candidates.length, repaired: 0, alreadyPresent: 0, reembedded: 0, failed: 0 };

    if (candidates.length === 0) {
      return report;
    }
    this.log.info({ candidates: candidates.length }, 'Repairing documents stuck at SqlLoaded');

    for (const doc of candidates) {
      if (signal?.aborted) {
        throw new PipelineCancelledError('Repair pass');
      }
      await this.repairOne(doc, report, signal);
    }

    this.log.info({ ...report }, 'Repair pass finished');
    return report;
  }

  private async repairOne(doc: DocumentProgress, report: RepairReport, signal?: AbortSignal): Promise<void> {
    const { checkpoint, loader } = this.deps;
    const contentHash = doc.contentHash;
    if (contentHash === null) {
      this.log.warn({ documentId: doc.id }, 'SqlLoaded document has no content hash, skipping repair');
      report.failed++;
      return;
    }

    try {
      if (await loader.vectorExists(doc.id, contentHash, signal)) {
        await checkpoint.commit({ kind: 'advance', id: doc.id, to: 'VectorLoaded' });
        await checkpoint.commit({ kind: 'advance', id: doc.id, to: 'Complete' });
        report.alreadyPresent++;
        return;
      }

      const embedding = await this.resolveEmbedding(doc, contentHash, report, signal);
      if (!embedding) {
        report.failed++;
        await checkpoint.commit({
          kind: 'store-error',
          id: doc.id,
          message: 'No clean text available to rebuild the vector',
        });
        return;
      }

      await loader.writeVector(toVectorRecord({ ...doc, contentHash, embedding }), signal);
      await checkpoint.commit({ kind: 'advance', id: doc.id, to: 'VectorLoaded' });
      await checkpoint.commit({ kind: 'advance', id: doc.id, to: 'Complete' });
      report.repaired++;
      this.log.info({ documentId: doc.id }, 'Vector repaired');
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }
      report.failed++;
      if (error instanceof StoreWriteError) {
        this.log.warn({ documentId: doc.id, error: error.message }, 'Vector repair failed, will retry next run');
        await checkpoint.commit({ kind: 'store-error', id: doc.id, message: error.message });
        return;
      }
      const failureKind = toFailureKind(error);
      const message = errorMessage(error);
      this.log.warn({ documentId: doc.id, kind: failureKind, error: message }, 'Vector repair failed');
      await checkpoint.commit({ kind: 'fail', id: doc.id, failureKind, message });
    }
  }

  /**
   * Embedding from the work product, or a fresh one from the stored clean text
   */
  private async resolveEmbedding(
    doc: DocumentProgress,
    contentHash: string,
    report: RepairReport,
    signal?: AbortSignal
  ): Promise<DocumentEmbedding | null> {
    const product = await this.deps.workProducts.load(doc.id, contentHash);
    if (product?.embedding) {
      return product.embedding;
    }

    let cleanText = product?.cleaned.cleanText;
    if (cleanText === undefined) {
      let stored: StoredLegislation | null;
      try {
        stored = await withTimeout(
          this.deps.relational.findById(doc.id),
          this.deps.readTimeoutMs,
          `relational read for ${doc.id}`
        );
      } catch (error) {
        throw new StoreWriteError('relational', doc.id, error);
      }
      if (!stored || stored.contentHash !== contentHash) {
        return null;
      }
      cleanText = stored.cleanText;
    }

    this.log.info({ documentId: doc.id }, 'Work product has no embedding, re-embedding for repair');
    report.reembedded++;
    return this.deps.embedder.embed(cleanText, { documentId: doc.id, signal });
  }
}
