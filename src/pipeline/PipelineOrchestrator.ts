/**
 * PipelineOrchestrator - one resumable run over a category and time period
 *
 * Startup prepares both stores, loads the checkpoint and runs the repair pass.
 * Then a producer feeds the extraction pool, first with unfinished documents
 * from the checkpoint and then from the listing, starting at the stored
 * cursor. Three worker pools (extract+clean, embed, load) are joined by
 * bounded queues, so a slow stage holds back the ones before it.
 *
 * Every stage change is committed to the checkpoint only after its side
 * effect is durable. Per-document failures are recorded and never stop the
 * run; a cancelled run leaves documents at their last committed stage.
 */

import type { Logger } from 'pino';
import type { CheckpointManager } from '../checkpoint/CheckpointManager.js';
import type { CheckpointScope, DocumentProgress } from '../checkpoint/checkpointSchema.js';
import { InvalidTransitionError, type StageTransition } from '../checkpoint/transitions.js';
import type { WorkProductStore } from '../checkpoint/WorkProductStore.js';
import { cleanDocument, type CleanContext, type CleanedDocument } from '../cleaning/LegislationCleaner.js';
import type { DocumentEmbedder, DocumentEmbedding } from '../embeddings/DocumentEmbedder.js';
import type { FetchedDocument, LegislationExtractor } from '../extraction/LegislationExtractor.js';
import type { ListingMetadata } from '../extraction/ListingParser.js';
import type { DualLoader } from '../loaders/DualLoader.js';
import type { RelationalStore, StoredLegislation } from '../stores/RelationalStore.js';
import type { VectorStore } from '../vector/VectorStore.js';
import { RepairService } from './RepairService.js';
import { counterForStage, emptyCounts, type FailureReport, type RunSummary, type SummaryCounts } from './runSummary.js';
import { hasReached, isProgressStage, nextStage, type ProgressStage } from './stages.js';
import { BoundedQueue, runWorkers } from '../utils/concurrency.js';
import { documentIdFromUrl, hasContentChanged } from '../utils/contentHash.js';
import {
  CleaningFailedError,
  FetchExhaustedError,
  StoreConnectionError,
  StoreWriteError,
  errorMessage,
  isCancellation,
  type StoreName,
} from '../utils/pipelineErrors.js';
import { attempt, type StageResult } from '../utils/stageResult.js';
import { withTimeout, DEFAULT_TIMEOUTS } from '../utils/withTimeout.js';
import { createChildLogger } from '../utils/logger.js';

export interface OrchestratorOptions {
  workers: { extract: number; embed: number; load: number; queueCapacity: number };
  /** Newly discovered documents per run, 0 for no limit */
  maxItems: number;
  repairGracePeriodMs: number;
  /** Timeout for relational reads during store inspection and repair */
  readTimeoutMs: number;
  schemaTimeoutMs?: number;
  skipRepair?: boolean;
  reset?: boolean;
}

export interface PipelineDependencies {
  extractor: LegislationExtractor;
  embedder: DocumentEmbedder;
  loader: DualLoader;
  relational: RelationalStore;
  vector: VectorStore;
  checkpoint: CheckpointManager;
  workProducts: WorkProductStore;
  clean?: (raw: Buffer, context: CleanContext, sectionPages?: readonly Buffer[]) => CleanedDocument;
  logger?: Logger;
  now?: () => Date;
}

interface DocumentRef {
  id: string;
  sourceUrl: string;
  listing: ListingMetadata;
}

interface EmbedJob {
  doc: DocumentRef;
  contentHash: string;
  cleaned: CleanedDocument;
  /** Present when a previous run already embedded this content */
  embedding: DocumentEmbedding | null;
}

interface LoadJob {
  doc: DocumentRef;
  contentHash: string;
  cleaned: CleanedDocument;
  embedding: DocumentEmbedding;
}

function refOf(progress: DocumentProgress): DocumentRef {
  return { id: progress.id, sourceUrl: progress.sourceUrl, listing: progress.listing };
}

export class PipelineOrchestrator {
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly clean: (raw: Buffer, context: CleanContext, sectionPages?: readonly Buffer[]) => CleanedDocument;
  private counts: SummaryCounts = emptyCounts();
  private failures: FailureReport[] = [];
  private listingError: string | null = null;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: OrchestratorOptions
  ) {
    this.log = deps.logger ?? createChildLogger({ component: 'PipelineOrchestrator' });
    this.now = deps.now ?? (() => new Date());
    this.clean = deps.clean ?? cleanDocument;
  }

  /**
   * Run the pipeline once
   *
   * @throws StoreConnectionError when a store cannot be prepared
   */
  async run(signal?: AbortSignal): Promise<RunSummary> {
    this.counts = emptyCounts();
    this.failures = [];
    this.listingError = null;
    const startedAt = this.now();

    await this.prepareStore('relational', this.deps.relational);
    await this.prepareStore('vector', this.deps.vector);

    const checkpoint = await this.deps.checkpoint.load({ reset: this.options.reset });
    const mode = this.deps.checkpoint.loadMode ?? 'fresh';
    const runLog = this.log.child({ runId: checkpoint.runId });
    runLog.info(
      { scope: checkpoint.scope, mode, resumeCount: checkpoint.resumeCount, cursor: checkpoint.lastListingCursor },
      'Pipeline run starting'
    );

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      if (!this.options.skipRepair) {
        const repair = new RepairService({
          checkpoint: this.deps.checkpoint,
          loader: this.deps.loader,
          workProducts: this.deps.workProducts,
          relational: this.deps.relational,
          embedder: this.deps.embedder,
          gracePeriodMs: this.options.repairGracePeriodMs,
          readTimeoutMs: this.options.readTimeoutMs,
          now: this.now,
          logger: runLog,
        });
        const report = await repair.run(controller.signal);
        this.counts.repaired += report.repaired;
      }
      await this.process(checkpoint.scope, controller.signal);
    } catch (error) {
      if (!isCancellation(error)) {
        throw error;
      }
      runLog.warn('Run cancelled');
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    const final = this.deps.checkpoint.current;
    const summary: RunSummary = {
      runId: final.runId,
      mode,
      startedAt: startedAt.toISOString(),
      finishedAt: this.now().toISOString(),
      counts: { ...this.counts },
      failures: [...this.failures],
      listingCursor: final.lastListingCursor,
      listingExhausted: final.listingExhausted,
      listingError: this.listingError,
      cancelled: controller.signal.aborted,
    };

    // Last write of the run: a failure here is not swallowed
    await this.deps.checkpoint.commit({
      kind: 'stats',
      stats: { ...summary.counts },
      lastError: this.listingError ?? summary.failures.at(-1)?.message ?? null,
    });

    runLog.info({ counts: summary.counts, failures: summary.failures.length, cancelled: summary.cancelled }, 'Pipeline run finished');
    return summary;
  }

  private async prepareStore(name: StoreName, store: RelationalStore | VectorStore): Promise<void> {
    try {
      await withTimeout(
        store.ensureSchema(),
        this.options.schemaTimeoutMs ?? DEFAULT_TIMEOUTS.SCHEMA_SETUP,
        `${name} schema setup`
      );
    } catch (error) {
      throw new StoreConnectionError(name, error);
    }
  }

  private async process(scope: CheckpointScope, signal: AbortSignal): Promise<void> {
    const { workers } = this.options;
    const extractQueue = new BoundedQueue<DocumentRef>(workers.queueCapacity);
    const embedQueue = new BoundedQueue<EmbedJob>(workers.queueCapacity);
    const loadQueue = new BoundedQueue<LoadJob>(workers.queueCapacity);

    const closeAll = () => {
      extractQueue.close(true);
      embedQueue.close(true);
      loadQueue.close(true);
    };
    if (signal.aborted) {
      closeAll();
    }
    signal.addEventListener('abort', closeAll, { once: true });

    // A pool that rejects must not leave the others blocked on a full queue
    const closeOnFailure = (error: unknown): never => {
      closeAll();
      throw error;
    };

    try {
      const producer = this.produce(scope, extractQueue, signal)
        .finally(() => extractQueue.close())
        .catch(closeOnFailure);
      const extraction = runWorkers(
        workers.extract,
        extractQueue,
        (doc) => this.guard(doc, () => this.extractOne(scope, doc, embedQueue, signal)),
        signal
      )
        .finally(() => embedQueue.close())
        .catch(closeOnFailure);
      const embedding = runWorkers(
        workers.embed,
        embedQueue,
        (job) => this.guard(job.doc, () => this.embedOne(job, loadQueue, signal)),
        signal
      )
        .finally(() => loadQueue.close())
        .catch(closeOnFailure);
      const loading = runWorkers(
        workers.load,
        loadQueue,
        (job) => this.guard(job.doc, () => this.loadOne(scope, job, signal)),
        signal
      ).catch(closeOnFailure);

      const results = await Promise.allSettled([producer, extraction, embedding, loading]);
      for (const result of results) {
        if (result.status === 'rejected') {
          throw result.reason;
        }
      }
    } finally {
      signal.removeEventListener('abort', closeAll);
    }
  }

  /**
   * Unfinished checkpoint documents first, then the listing from the stored cursor
   */
  private async produce(scope: CheckpointScope, queue: BoundedQueue<DocumentRef>, signal: AbortSignal): Promise<void> {
    const seen = new Set<string>();
    const ledger = Object.values(this.deps.checkpoint.current.documents).sort(
      (a, b) => a.discoveredAt.localeCompare(b.discoveredAt) || a.id.localeCompare(b.id)
    );

    for (const entry of ledger) {
      if (signal.aborted) {
        return;
      }

      let stage = entry.stage;
      if (stage === 'Failed') {
        await this.commit({ kind: 'retry', id: entry.id });
        stage = entry.lastCompletedStage;
        this.log.info(
          { documentId: entry.id, resumeFrom: stage, failure: entry.failure?.kind },
          'Retrying failed document'
        );
      }

      if (stage === 'Complete') {
        continue;
      }
      if (stage === 'VectorLoaded') {
        await this.advance(entry.id, 'Complete');
        continue;
      }

      seen.add(entry.id);
      // Documents stuck at SqlLoaded belong to the repair pass unless they were just retried
      if (stage === 'SqlLoaded' && entry.stage !== 'Failed') {
        continue;
      }
      if (!(await queue.push(refOf(entry)))) {
        return;
      }
    }

    if (this.deps.checkpoint.current.listingExhausted) {
      this.log.info('Listing already exhausted for this run');
      return;
    }

    await this.discover(scope, queue, seen, signal);
  }

  private async discover(
    scope: CheckpointScope,
    queue: BoundedQueue<DocumentRef>,
    seen: Set<string>,
    signal: AbortSignal
  ): Promise<void> {
    const { extractor, checkpoint } = this.deps;
    const { maxItems } = this.options;
    let discovered = 0;

    try {
      const pages = extractor.listPages(scope.category, scope.timePeriod, checkpoint.current.lastListingCursor, signal);
      for await (const page of pages) {
        for (const entry of page.entries) {
          const id = documentIdFromUrl(entry.url);
          if (seen.has(id)) {
            continue;
          }

          const known = checkpoint.current.documents[id];
          if (known) {
            seen.add(id);
            // Finished documents get a hash check; anything else was queued from the ledger
            if (known.stage === 'Complete' && !(await queue.push(refOf(known)))) {
              return;
            }
            continue;
          }

          if (maxItems > 0 && discovered >= maxItems) {
            // Page cursor stays where it is, so the next run picks up the rest of this page
            this.log.info({ maxItems, cursor: page.cursor }, 'Item limit reached, listing stopped');
            return;
          }

          seen.add(id);
          await this.commit({
            kind: 'discovered',
            document: {
              id,
              sourceUrl: entry.url,
              category: scope.category,
              timePeriod: scope.timePeriod,
              listing: entry.listing,
            },
          });
          discovered++;
          this.counts.discovered++;

          if (!(await queue.push({ id, sourceUrl: entry.url, listing: entry.listing }))) {
            return;
          }
        }

        await this.commit(
          page.nextCursor ? { kind: 'cursor', cursor: page.nextCursor } : { kind: 'listing-exhausted' }
        );
      }
    } catch (error) {
      if (isCancellation(error)) {
        return;
      }
      if (error instanceof FetchExhaustedError) {
        this.listingError = error.message;
        this.log.error(
          { error: error.message, cursor: checkpoint.current.lastListingCursor },
          'Listing page could not be read, listing stopped'
        );
        return;
      }
      throw error;
    }
  }

  /**
   * Fetch, compare the content hash, clean
   */
  private async extractOne(
    scope: CheckpointScope,
    doc: DocumentRef,
    embedQueue: BoundedQueue<EmbedJob>,
    signal: AbortSignal
  ): Promise<void> {
    const before = this.progressOf(doc.id);
    const fetched = await this.deps.extractor.fetchDocument(doc.sourceUrl, signal);
    this.counts[fetched.fromCache ? 'fetchedFromCache' : 'fetched']++;
    const contentHash = fetched.contentHash;

    let stage: ProgressStage;
    if (before.stage === 'Discovered') {
      await this.advance(doc.id, 'Fetched', contentHash);
      stage = await this.inspectStores(doc, contentHash, signal);
      if (stage === 'Complete') {
        return;
      }
    } else if (hasContentChanged(contentHash, before.contentHash)) {
      await this.commit({ kind: 'content-changed', id: doc.id, contentHash });
      this.counts.changed++;
      this.log.info({ documentId: doc.id, previous: before.contentHash, current: contentHash }, 'Content changed, reprocessing');
      stage = 'Fetched';
    } else if (before.stage === 'Complete') {
      this.counts.unchanged++;
      return;
    } else if (isProgressStage(before.stage)) {
      stage = before.stage;
    } else {
      throw new Error(`Document ${doc.id} is Failed and was not retried`);
    }

    const product = hasReached(stage, 'Cleaned') ? await this.deps.workProducts.load(doc.id, contentHash) : null;
    let cleaned: CleanedDocument;
    if (product) {
      cleaned = product.cleaned;
    } else {
      cleaned = await this.cleanRaw(doc, scope, fetched);
      await this.deps.workProducts.save({ documentId: doc.id, contentHash, cleaned, embedding: null });
    }

    if (stage === 'Fetched') {
      await this.advance(doc.id, 'Cleaned');
    }

    const accepted = await embedQueue.push({ doc, contentHash, cleaned, embedding: product?.embedding ?? null });
    if (!accepted) {
      this.log.debug({ documentId: doc.id }, 'Embed queue closed, document stays at its stage');
    }
  }

  private async cleanRaw(doc: DocumentRef, scope: CheckpointScope, fetched: FetchedDocument): Promise<CleanedDocument> {
    const { bytes } = fetched;
    try {
      return this.clean(
        bytes,
        {
          documentId: doc.id,
          category: scope.category,
          timePeriod: scope.timePeriod,
          listing: doc.listing,
        },
        fetched.sections.map((section) => section.bytes)
      );
    } catch (error) {
      if (error instanceof CleaningFailedError) {
        try {
          await this.deps.workProducts.saveRejected(doc.id, bytes);
        } catch (saveError) {
          this.log.warn({ documentId: doc.id, error: saveError }, 'Could not keep raw bytes of rejected document');
        }
      }
      throw error;
    }
  }

  /**
   * A newly discovered document may already be in the stores from a run whose
   * checkpoint was lost. When the relational row holds the same hash, the
   * checkpoint is advanced without redoing the work.
   *
   * @returns the stage the document is at afterwards
   */
  private async inspectStores(doc: DocumentRef, contentHash: string, signal: AbortSignal): Promise<ProgressStage> {
    let stored: StoredLegislation | null;
    try {
      stored = await withTimeout(
        this.deps.relational.findById(doc.id),
        this.options.readTimeoutMs,
        `relational read for ${doc.id}`
      );
    } catch (error) {
      this.log.warn({ documentId: doc.id, error: errorMessage(error) }, 'Store inspection failed, processing normally');
      return 'Fetched';
    }
    if (!stored || stored.contentHash !== contentHash) {
      return 'Fetched';
    }

    for (const stage of ['Cleaned', 'Embedded', 'SqlLoaded'] as const) {
      await this.advance(doc.id, stage, undefined, false);
    }
    this.counts.recovered++;

    let vectorPresent = false;
    try {
      vectorPresent = await this.deps.loader.vectorExists(doc.id, contentHash, signal);
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }
      this.log.warn({ documentId: doc.id, error: errorMessage(error) }, 'Vector lookup failed during store inspection');
    }
    if (!vectorPresent) {
      this.log.info({ documentId: doc.id }, 'Relational row already current, only the vector is missing');
      return 'SqlLoaded';
    }

    await this.advance(doc.id, 'VectorLoaded', undefined, false);
    await this.advance(doc.id, 'Complete', undefined, false);
    this.log.info({ documentId: doc.id }, 'Both stores already current, document recovered');
    return 'Complete';
  }

  private async embedOne(job: EmbedJob, loadQueue: BoundedQueue<LoadJob>, signal: AbortSignal): Promise<void> {
    const { doc, contentHash, cleaned } = job;
    const stage = this.stageOf(doc.id);

    let embedding = job.embedding;
    if (!embedding) {
      embedding = await this.deps.embedder.embed(cleaned.cleanText, { documentId: doc.id, signal });
      await this.deps.workProducts.save({ documentId: doc.id, contentHash, cleaned, embedding });
    }
    if (embedding.lowQuality) {
      this.counts.lowQuality++;
    }

    if (stage === 'Cleaned') {
      await this.advance(doc.id, 'Embedded');
    }

    const accepted = await loadQueue.push({ doc, contentHash, cleaned, embedding });
    if (!accepted) {
      this.log.debug({ documentId: doc.id }, 'Load queue closed, document stays at its stage');
    }
  }

  private async loadOne(scope: CheckpointScope, job: LoadJob, signal: AbortSignal): Promise<void> {
    const { doc } = job;
    const result = await this.deps.loader.load(
      {
        id: doc.id,
        sourceUrl: doc.sourceUrl,
        category: scope.category,
        timePeriod: scope.timePeriod,
        contentHash: job.contentHash,
        stage: this.stageOf(doc.id),
        cleaned: job.cleaned,
        embedding: job.embedding,
      },
      async (reached) => {
        await this.advance(doc.id, reached);
        if (reached === 'VectorLoaded') {
          await this.advance(doc.id, 'Complete');
        }
      },
      signal
    );

    if (result.error) {
      throw result.error;
    }
  }

  /**
   * Run one stage for one document and record a failure instead of throwing
   */
  private async guard(doc: DocumentRef, body: () => Promise<void>): Promise<void> {
    const result = await attempt(body);
    if (!result.ok) {
      await this.recordFailure(doc, result);
    }
  }

  private async recordFailure(doc: DocumentRef, failure: Extract<StageResult<void>, { ok: false }>): Promise<void> {
    const { error, kind, message } = failure;
    if (isCancellation(error)) {
      this.log.debug({ documentId: doc.id }, 'Stage interrupted by cancellation');
      return;
    }
    if (error instanceof InvalidTransitionError) {
      throw error;
    }

    const progress = this.deps.checkpoint.current.documents[doc.id];
    if (!progress) {
      this.log.error({ documentId: doc.id, error: message }, 'Failure for a document missing from the checkpoint');
      return;
    }

    if (error instanceof StoreWriteError) {
      // Stays at its last good stage; the repair pass or the next run retries the write
      this.counts.storeErrors++;
      await this.commit({ kind: 'store-error', id: doc.id, message });
      this.failures.push({
        id: doc.id,
        sourceUrl: doc.sourceUrl,
        stage: nextStage(progress.lastCompletedStage) ?? progress.lastCompletedStage,
        kind,
        message,
      });
      this.log.warn({ documentId: doc.id, store: error.store, error: message }, 'Store write failed');
      return;
    }

    if (progress.stage === 'Complete' || progress.stage === 'Failed') {
      this.log.warn({ documentId: doc.id, stage: progress.stage, error: message }, 'Hash check failed, keeping stored result');
      return;
    }

    await this.commit({ kind: 'fail', id: doc.id, failureKind: kind, message });
    this.counts.failed++;
    const failedStage = this.deps.checkpoint.current.documents[doc.id]?.failure?.stage ?? progress.lastCompletedStage;
    this.failures.push({ id: doc.id, sourceUrl: doc.sourceUrl, stage: failedStage, kind, message });
    this.log.warn({ documentId: doc.id, stage: failedStage, kind, error: message }, 'Document failed');
  }

  private progressOf(id: string): DocumentProgress {
    const progress = this.deps.checkpoint.current.documents[id];
    if (!progress) {
      throw new Error(`Document ${id} is not in the checkpoint`);
    }
    return progress;
  }

  private stageOf(id: string): ProgressStage {
    const { stage } = this.progressOf(id);
    if (!isProgressStage(stage)) {
      throw new Error(`Document ${id} is Failed`);
    }
    return stage;
  }

  private async advance(id: string, to: ProgressStage, contentHash?: string, count = true): Promise<void> {
    await this.commit({ kind: 'advance', id, to, contentHash });
    const counter = counterForStage(to);
    if (count && counter) {
      this.counts[counter]++;
    }
  }

  /**
   * Commit a transition. A save that fails is logged and counted: the
   * transition is kept in memory and goes out with the next save.
   */
  private async commit(transition: StageTransition): Promise<void> {
    try {
      await this.deps.checkpoint.commit(transition);
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        throw error;
      }
      this.counts.checkpointWriteFailures++;
      this.log.error({ error: errorMessage(error), transition: transition.kind }, 'Checkpoint write failed');
    }
  }
}
