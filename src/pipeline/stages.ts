/**
 * Document lifecycle stages
 *
 * Discovered → Fetched → Cleaned → Embedded → SqlLoaded → VectorLoaded → Complete,
 * with Failed reachable from any stage before Complete.
 */

export const PROGRESS_STAGES = [
  'Discovered',
  'Fetched',
  'Cleaned',
  'Embedded',
  'SqlLoaded',
  'VectorLoaded',
  'Complete',
] as const;

export type ProgressStage = (typeof PROGRESS_STAGES)[number];

export type Stage = ProgressStage | 'Failed';

export const ALL_STAGES = [...PROGRESS_STAGES, 'Failed'] as const;

export function stageIndex(stage: ProgressStage): number {
  return PROGRESS_STAGES.indexOf(stage);
}

/**
 * The stage that follows `stage`, or null after Complete
 */
export function nextStage(stage: ProgressStage): ProgressStage | null {
  const index = stageIndex(stage);
  return index >= 0 && index < PROGRESS_STAGES.length - 1 ? PROGRESS_STAGES[index + 1] : null;
}

export function isProgressStage(stage: Stage): stage is ProgressStage {
  return stage !== 'Failed';
}

/**
 * True when `stage` is `target` or later
 */
export function hasReached(stage: ProgressStage, target: ProgressStage): boolean {
  return stageIndex(stage) >= stageIndex(target);
}
