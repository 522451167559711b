/**
 * Pipeline Error Types
 *
 * Error taxonomy for the legislation ETL. Per-document errors route a document
 * to Failed (or leave it at its last good stage); ConfigurationError aborts the
 * run before any document is touched.
 */

/**
 * Failure reasons carried by a Failed document and by the run summary
 */
export type FailureKind =
  | 'TransientNetworkError'
  | 'FetchExhausted'
  | 'EmbeddingExhausted'
  | 'CleaningFailed'
  | 'StoreWriteError'
  | 'ConfigurationError'
  | 'Unknown';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A network failure worth retrying: connection errors, timeouts, HTTP 429 and 5xx
 */
export class TransientNetworkError extends Error {
  constructor(
    public readonly url: string,
    public readonly statusCode: number | undefined,
    cause: unknown,
    public readonly retryAfterSeconds?: number
  ) {
    super(`Transient failure fetching ${url}${statusCode ? ` (HTTP ${statusCode})` : ''}: ${describe(cause)}`, { cause });
    this.name = 'TransientNetworkError';
  }
}

/**
 * Thrown once a fetch has used up its retry budget, or hit a status that is never retried
 */
export class FetchExhaustedError extends Error {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    lastError: unknown
  ) {
    super(`Fetching ${url} failed after ${attempts} attempt(s): ${describe(lastError)}`, { cause: lastError });
    this.name = 'FetchExhaustedError';
  }
}

export class EmbeddingExhaustedError extends Error {
  constructor(
    public readonly documentId: string,
    public readonly attempts: number,
    lastError: unknown
  ) {
    super(`Embedding document ${documentId} failed after ${attempts} attempt(s): ${describe(lastError)}`, {
      cause: lastError,
    });
    this.name = 'EmbeddingExhaustedError';
  }
}

export class CleaningFailedError extends Error {
  constructor(
    public readonly documentId: string,
    public readonly reason: string
  ) {
    super(`Cleaning document ${documentId} failed: ${reason}`);
    this.name = 'CleaningFailedError';
  }
}

export type StoreName = 'relational' | 'vector';

export class StoreWriteError extends Error {
  constructor(
    public readonly store: StoreName,
    public readonly documentId: string,
    cause: unknown
  ) {
    super(`Writing document ${documentId} to the ${store} store failed: ${describe(cause)}`, { cause });
    this.name = 'StoreWriteError';
  }
}

/**
 * Fatal: a required store could not be reached or prepared at startup
 */
export class StoreConnectionError extends Error {
  constructor(
    public readonly store: StoreName,
    cause: unknown
  ) {
    super(`${store} store connection failed: ${describe(cause)}`, { cause });
    this.name = 'StoreConnectionError';
  }
}

/**
 * Fatal: raised during startup, lists every problem found
 */
export class ConfigurationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when the run's abort signal fires while an operation is waiting.
 * Never recorded as a document failure.
 */
export class PipelineCancelledError extends Error {
  constructor(operation?: string) {
    super(operation ? `${operation} cancelled` : 'Pipeline run cancelled');
    this.name = 'PipelineCancelledError';
  }
}

export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Map a thrown value onto the failure taxonomy
 */
export function toFailureKind(error: unknown): FailureKind {
  if (error instanceof FetchExhaustedError) return 'FetchExhausted';
  if (error instanceof EmbeddingExhaustedError) return 'EmbeddingExhausted';
  if (error instanceof CleaningFailedError) return 'CleaningFailed';
  if (error instanceof StoreWriteError) return 'StoreWriteError';
  if (error instanceof ConfigurationError) return 'ConfigurationError';
  if (error instanceof TransientNetworkError || error instanceof TimeoutError) return 'TransientNetworkError';
  return 'Unknown';
}

export function isCancellation(error: unknown): boolean {
  return error instanceof PipelineCancelledError;
}

export function errorMessage(error: unknown): string {
  return describe(error);
}
