/**
 * Checkpoint transitions
 *
 * applyTransition is pure: it returns a new Checkpoint and never touches the
 * one passed in. The manager is the only caller that persists the result.
 */

import { randomBytes } from 'crypto';
import type { Checkpoint, CheckpointScope, DocumentProgress } from './checkpointSchema.js';
import type { ListingMetadata } from '../extraction/ListingParser.js';
import type { FailureKind } from '../utils/pipelineErrors.js';
import { PROGRESS_STAGES, isProgressStage, nextStage, hasReached, type ProgressStage } from '../pipeline/stages.js';

export type StageTransition =
  | {
      kind: 'discovered';
      document: { id: string; sourceUrl: string; category: string; timePeriod: string; listing: ListingMetadata };
    }
  | { kind: 'advance'; id: string; to: ProgressStage; contentHash?: string }
  | { kind: 'fail'; id: string; failureKind: FailureKind; message: string }
  | { kind: 'retry'; id: string }
  | { kind: 'content-changed'; id: string; contentHash: string }
  | { kind: 'store-error'; id: string; message: string }
  | { kind: 'cursor'; cursor: string }
  | { kind: 'listing-exhausted' }
  | { kind: 'stats'; stats: Record<string, number>; lastError?: string | null };

export class InvalidTransitionError extends Error {
  constructor(
    public readonly documentId: string,
    message: string
  ) {
    super(`Invalid transition for ${documentId}: ${message}`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Run id in the form etl-{timestamp}-{random}
 */
export function generateRunId(now: Date = new Date()): string {
  return `etl-${now.getTime()}-${randomBytes(8).toString('hex')}`;
}

export function createCheckpoint(scope: CheckpointScope, runId: string, now: Date = new Date()): Checkpoint {
  const timestamp = now.toISOString();
  return {
    version: 1,
    runId,
    scope,
    runStartedAt: timestamp,
    lastUpdate: timestamp,
    resumeCount: 0,
    lastListingCursor: null,
    listingExhausted: false,
    documents: {},
    stats: {},
    lastError: null,
  };
}

/**
 * New run over an existing ledger: listing restarts, document history is kept
 */
export function startNewRun(previous: Checkpoint, runId: string, now: Date = new Date()): Checkpoint {
  return {
    ...createCheckpoint(previous.scope, runId, now),
    documents: previous.documents,
  };
}

/**
 * Documents a resumed run still has to push forward. Failed documents are
 * retried separately and do not keep a finished run open.
 */
export function pendingDocuments(checkpoint: Checkpoint): DocumentProgress[] {
  return Object.values(checkpoint.documents).filter((doc) => doc.stage !== 'Complete' && doc.stage !== 'Failed');
}

export function failedDocuments(checkpoint: Checkpoint): DocumentProgress[] {
  return Object.values(checkpoint.documents).filter((doc) => doc.stage === 'Failed');
}

/**
 * Ids of documents that have completed each stage
 */
export function completedByStage(checkpoint: Checkpoint): Record<ProgressStage, string[]> {
  const completed: Record<ProgressStage, string[]> = {
    Discovered: [],
    Fetched: [],
    Cleaned: [],
    Embedded: [],
    SqlLoaded: [],
    VectorLoaded: [],
    Complete: [],
  };
  for (const doc of Object.values(checkpoint.documents)) {
    for (const stage of PROGRESS_STAGES) {
      if (hasReached(doc.lastCompletedStage, stage)) {
        completed[stage].push(doc.id);
      }
    }
  }
  for (const stage of PROGRESS_STAGES) {
    completed[stage].sort();
  }
  return completed;
}

function requireDocument(checkpoint: Checkpoint, id: string): DocumentProgress {
  const doc = checkpoint.documents[id];
  if (!doc) {
    throw new InvalidTransitionError(id, 'document is not in the checkpoint');
  }
  return doc;
}

function withDocument(checkpoint: Checkpoint, doc: DocumentProgress, timestamp: string): Checkpoint {
  return {
    ...checkpoint,
    lastUpdate: timestamp,
    documents: { ...checkpoint.documents, [doc.id]: doc },
  };
}

export function applyTransition(checkpoint: Checkpoint, transition: StageTransition, now: Date = new Date()): Checkpoint {
  const timestamp = now.toISOString();

  switch (transition.kind) {
    case 'discovered': {
      if (checkpoint.documents[transition.document.id]) {
        return checkpoint;
      }
      return withDocument(
        checkpoint,
        {
          ...transition.document,
          contentHash: null,
          stage: 'Discovered',
          lastCompletedStage: 'Discovered',
          failure: null,
          lastError: null,
          failureCount: 0,
          discoveredAt: timestamp,
          stageUpdatedAt: timestamp,
        },
        timestamp
      );
    }

    case 'advance': {
      const doc = requireDocument(checkpoint, transition.id);
      if (!isProgressStage(doc.stage)) {
        throw new InvalidTransitionError(doc.id, `cannot advance a Failed document to ${transition.to}; retry it first`);
      }
      const expected = nextStage(doc.stage);
      if (expected !== transition.to) {
        throw new InvalidTransitionError(doc.id, `cannot move from ${doc.stage} to ${transition.to}`);
      }
      if (transition.to === 'Fetched' && !transition.contentHash) {
        throw new InvalidTransitionError(doc.id, 'Fetched requires a content hash');
      }
      return withDocument(
        checkpoint,
        {
          ...doc,
          stage: transition.to,
          lastCompletedStage: transition.to,
          contentHash: transition.contentHash ?? doc.contentHash,
          lastError: null,
          stageUpdatedAt: timestamp,
        },
        timestamp
      );
    }

    case 'fail': {
      const doc = requireDocument(checkpoint, transition.id);
      if (doc.stage === 'Complete') {
        throw new InvalidTransitionError(doc.id, 'a Complete document cannot fail');
      }
      const attempted = nextStage(doc.lastCompletedStage) ?? doc.lastCompletedStage;
      return withDocument(
        checkpoint,
        {
          ...doc,
          stage: 'Failed',
          failure: { kind: transition.failureKind, message: transition.message, stage: attempted, at: timestamp },
          failureCount: doc.failureCount + 1,
          stageUpdatedAt: timestamp,
        },
        timestamp
      );
    }

    case 'retry': {
      const doc = requireDocument(checkpoint, transition.id);
      if (doc.stage !== 'Failed') {
        throw new InvalidTransitionError(doc.id, `only Failed documents can be retried (stage is ${doc.stage})`);
      }
      return withDocument(
        checkpoint,
        { ...doc, stage: doc.lastCompletedStage, failure: null, stageUpdatedAt: timestamp },
        timestamp
      );
    }

    case 'content-changed': {
      const doc = requireDocument(checkpoint, transition.id);
      if (doc.stage === 'Failed' || doc.stage === 'Discovered') {
        throw new InvalidTransitionError(doc.id, `content change is only recorded for fetched documents (stage is ${doc.stage})`);
      }
      return withDocument(
        checkpoint,
        {
          ...doc,
          stage: 'Fetched',
          lastCompletedStage: 'Fetched',
          contentHash: transition.contentHash,
          lastError: null,
          stageUpdatedAt: timestamp,
        },
        timestamp
      );
    }

    case 'store-error': {
      const doc = requireDocument(checkpoint, transition.id);
      return withDocument(
        checkpoint,
        { ...doc, lastError: { kind: 'StoreWriteError', message: transition.message, at: timestamp } },
        timestamp
      );
    }

    case 'cursor':
      return { ...checkpoint, lastListingCursor: transition.cursor, lastUpdate: timestamp };

    case 'listing-exhausted':
      return { ...checkpoint, listingExhausted: true, lastUpdate: timestamp };

    case 'stats':
      return {
        ...checkpoint,
        stats: { ...transition.stats },
        lastError: transition.lastError === undefined ? checkpoint.lastError : transition.lastError,
        lastUpdate: timestamp,
      };
  }
}
