import { z } from 'zod';
import { ALL_STAGES, PROGRESS_STAGES } from '../pipeline/stages.js';

const failureKindSchema = z.enum([
  'TransientNetworkError',
  'FetchExhausted',
  'EmbeddingExhausted',
  'CleaningFailed',
  'StoreWriteError',
  'ConfigurationError',
  'Unknown',
]);

export const listingMetadataSchema = z.object({
  title: z.string(),
  year: z.string(),
  number: z.string(),
  documentType: z.string(),
});

export const documentProgressSchema = z.object({
  id: z.string(),
  sourceUrl: z.string(),
  category: z.string(),
  timePeriod: z.string(),
  listing: listingMetadataSchema,
  contentHash: z.string().nullable(),
  stage: z.enum(ALL_STAGES),
  /** Last stage whose side effect landed; where a retry resumes */
  lastCompletedStage: z.enum(PROGRESS_STAGES),
  failure: z
    .object({
      kind: failureKindSchema,
      message: z.string(),
      /** Stage that was being attempted */
      stage: z.enum(PROGRESS_STAGES),
      at: z.string(),
    })
    .nullable(),
  /** Store write failure that left the document at its last good stage */
  lastError: z
    .object({
      kind: failureKindSchema,
      message: z.string(),
      at: z.string(),
    })
    .nullable(),
  failureCount: z.number().int().nonnegative(),
  discoveredAt: z.string(),
  stageUpdatedAt: z.string(),
});

export const checkpointSchema = z.object({
  version: z.literal(1),
  runId: z.string(),
  scope: z.object({ category: z.string(), timePeriod: z.string() }),
  runStartedAt: z.string(),
  lastUpdate: z.string(),
  resumeCount: z.number().int().nonnegative(),
  lastListingCursor: z.string().nullable(),
  listingExhausted: z.boolean(),
  documents: z.record(documentProgressSchema),
  stats: z.record(z.number()),
  lastError: z.string().nullable(),
});

/**
 * On-disk form: the checkpoint plus the derived per-stage completion sets
 */
export const checkpointFileSchema = checkpointSchema.extend({
  completedByStage: z.record(z.array(z.string())).optional(),
});

export type Checkpoint = z.infer<typeof checkpointSchema>;
export type DocumentProgress = z.infer<typeof documentProgressSchema>;
export type CheckpointScope = Checkpoint['scope'];
export type CheckpointFile = z.infer<typeof checkpointFileSchema>;
