/**
 * Run summary: what one invocation did, reported at the end of the run and
 * stored in the checkpoint's stats
 */

import type { ProgressStage } from './stages.js';
import type { FailureKind } from '../utils/pipelineErrors.js';
import type { CheckpointLoadMode } from '../checkpoint/CheckpointManager.js';

export const SUMMARY_COUNTERS = [
  'discovered',
  'fetched',
  'fetchedFromCache',
  'unchanged',
  'changed',
  'recovered',
  'cleaned',
  'embedded',
  'sqlLoaded',
  'vectorLoaded',
  'completed',
  'failed',
  'storeErrors',
  'repaired',
  'lowQuality',
  'checkpointWriteFailures',
] as const;

export type SummaryCounter = (typeof SUMMARY_COUNTERS)[number];

export type SummaryCounts = Record<SummaryCounter, number>;

export interface FailureReport {
  id: string;
  sourceUrl: string;
  /** Stage being attempted when the document failed */
  stage: ProgressStage;
  kind: FailureKind;
  message: string;
}

export interface RunSummary {
  runId: string;
  mode: CheckpointLoadMode;
  startedAt: string;
  finishedAt: string;
  counts: SummaryCounts;
  failures: FailureReport[];
  listingCursor: string | null;
  listingExhausted: boolean;
  /** Set when a listing page could not be read and listing stopped early */
  listingError: string | null;
  cancelled: boolean;
}

export function emptyCounts(): SummaryCounts {
  return {
    discovered: 0,
    fetched: 0,
    fetchedFromCache: 0,
    unchanged: 0,
    changed: 0,
    recovered: 0,
    cleaned: 0,
    embedded: 0,
    sqlLoaded: 0,
    vectorLoaded: 0,
    completed: 0,
    failed: 0,
    storeErrors: 0,
    repaired: 0,
    lowQuality: 0,
    checkpointWriteFailures: 0,
  };
}

/**
 * Counter bumped when a document is committed to `stage`
 */
export function counterForStage(stage: ProgressStage): SummaryCounter | null {
  switch (stage) {
    case 'Cleaned':
      return 'cleaned';
    case 'Embedded':
      return 'embedded';
    case 'SqlLoaded':
      return 'sqlLoaded';
    case 'VectorLoaded':
      return 'vectorLoaded';
    case 'Complete':
      return 'completed';
    default:
      return null;
  }
}
