/**
 * CheckpointManager
 *
 * Owns the run's Checkpoint value. commit() applies a transition in memory,
 * then resolves once a save that includes it has landed. Commits arriving
 * while a save is running share the next save, so concurrent workers never
 * interleave writes and never wait for one write per document.
 *
 * Callers commit only after the side effect a transition describes is durable.
 */

import type { Logger } from 'pino';
import type { Checkpoint, CheckpointScope } from './checkpointSchema.js';
import type { CheckpointStore } from './CheckpointStore.js';
import {
  applyTransition,
  createCheckpoint,
  generateRunId,
  pendingDocuments,
  startNewRun,
  type StageTransition,
} from './transitions.js';
import { logger as rootLogger } from '../utils/logger.js';

export type CheckpointLoadMode = 'fresh' | 'resumed' | 'new-run';

export class CheckpointManager {
  private checkpoint: Checkpoint | null = null;
  private saveChain: Promise<void> = Promise.resolve();
  private queuedSave: Promise<void> | null = null;
  private readonly log: Logger;
  private readonly now: () => Date;
  loadMode: CheckpointLoadMode | null = null;

  constructor(
    private readonly store: CheckpointStore,
    private readonly scope: CheckpointScope,
    options: { logger?: Logger; now?: () => Date } = {}
  ) {
    this.log = options.logger ?? rootLogger.child({ component: 'checkpoint' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load the scope's checkpoint and decide where this run starts
   *
   * - nothing stored (or reset): fresh checkpoint
   * - listing finished and nothing pending: new run over the same ledger
   * - otherwise: resume, keeping run id and listing cursor
   */
  async load(options: { reset?: boolean } = {}): Promise<Checkpoint> {
    const now = this.now();
    if (options.reset) {
      await this.store.remove(this.scope);
      this.log.warn({ scope: this.scope }, 'Checkpoint reset requested, starting from scratch');
    }

    const stored = options.reset ? null : await this.store.load(this.scope);
    let checkpoint: Checkpoint;

    if (!stored) {
      checkpoint = createCheckpoint(this.scope, generateRunId(now), now);
      this.loadMode = 'fresh';
    } else if (stored.listingExhausted && pendingDocuments(stored).length === 0) {
      checkpoint = startNewRun(stored, generateRunId(now), now);
      this.loadMode = 'new-run';
    } else {
      checkpoint = { ...stored, resumeCount: stored.resumeCount + 1, lastUpdate: now.toISOString() };
      this.loadMode = 'resumed';
    }

    this.checkpoint = checkpoint;
    this.log.info(
      {
        runId: checkpoint.runId,
        mode: this.loadMode,
        cursor: checkpoint.lastListingCursor,
        knownDocuments: Object.keys(checkpoint.documents).length,
      },
      'Checkpoint loaded'
    );
    await this.persist();
    return checkpoint;
  }

  get current(): Checkpoint {
    if (!this.checkpoint) {
      throw new Error('Checkpoint not loaded');
    }
    return this.checkpoint;
  }

  /**
   * Record a transition and wait until it is on disk
   *
   * @returns the checkpoint including this transition
   */
  async commit(transition: StageTransition): Promise<Checkpoint> {
    const next = applyTransition(this.current, transition, this.now());
    this.checkpoint = next;
    if (transition.kind === 'advance' || transition.kind === 'fail' || transition.kind === 'content-changed') {
      this.log.debug({ transition }, 'Checkpoint transition');
    }
    await this.persist();
    return next;
  }

  /**
   * Wait for every committed transition to be saved
   */
  async flush(): Promise<void> {
    await this.persist();
  }

  private persist(): Promise<void> {
    if (this.queuedSave) {
      return this.queuedSave;
    }
    const save = async () => {
      this.queuedSave = null;
      await this.store.save(this.current);
    };
    const next = this.saveChain.then(save, save);
    this.queuedSave = next;
    this.saveChain = next;
    return next;
  }
}
