/**
 * Timeout utility for wrapping async operations
 *
 * Every network fetch and store write goes through here, so a hung call
 * surfaces as a retryable TimeoutError instead of stalling a worker.
 */

import { TimeoutError } from './pipelineErrors.js';

/**
 * Wrap a promise with a timeout
 *
 * @param timeoutMs - Timeout in milliseconds; 0 disables the timeout
 * @param operationName - Name used in the error message
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operationName?: string): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  const operation = operationName || 'Operation';
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Default timeout values (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /** Single HTTP request */
  HTTP_REQUEST: 30000,
  /** Single store write or lookup */
  STORE_WRITE: 30000,
  /** Schema creation at startup */
  SCHEMA_SETUP: 60000,
  /** Batch of embedding calls */
  EMBEDDING_BATCH: 2 * 60 * 1000,
} as const;
