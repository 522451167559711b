import { toFailureKind, errorMessage, type FailureKind } from './pipelineErrors.js';

/**
 * Outcome of one stage for one document
 */
export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: FailureKind; message: string; error: unknown };

export function ok<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function err<T>(error: unknown): StageResult<T> {
  return { ok: false, kind: toFailureKind(error), message: errorMessage(error), error };
}

/**
 * Run a stage body and capture any thrown error as a failed result
 */
export async function attempt<T>(body: () => Promise<T>): Promise<StageResult<T>> {
  try {
    return ok(await body());
  } catch (error) {
    return err(error);
  }
}
