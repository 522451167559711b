/**
 * Retry Utility with Exponential Backoff
 *
 * A retry policy is a plain object handed to retryWithBackoff. The scheduler
 * checks the run's AbortSignal before every attempt and while waiting between
 * attempts, so cancellation never has to wait out a backoff.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from './logger.js';
import { PipelineCancelledError, TransientNetworkError, TimeoutError } from './pipelineErrors.js';

/**
 * Retry policy
 */
export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the first retry in milliseconds */
  initialDelay: number;
  /** Upper bound for any single delay */
  maxDelay: number;
  /** Exponential backoff multiplier */
  multiplier: number;
  /** Fraction of each delay that is randomized (0 = none, 1 = full jitter) */
  jitter: number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryOptions {
  /** Label for log lines (URL, document id) */
  context?: string;
  signal?: AbortSignal;
  logger?: Logger;
  /** Injected for tests */
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Thrown by retryWithBackoff when the policy runs out, wraps the last error
 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
    public readonly retryable: boolean
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${lastError instanceof Error ? lastError.message : String(lastError)}`,
      { cause: lastError }
    );
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Transient errors: TransientNetworkError, timeouts, 429/5xx responses and connection resets
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientNetworkError || error instanceof TimeoutError) {
    return true;
  }

  if (error && typeof error === 'object' && 'response' in error) {
    const response = (error as { response?: { status?: number } }).response;
    if (response?.status) {
      return response.status === 429 || (response.status >= 500 && response.status < 600);
    }
  }

  if (error && typeof error === 'object' && 'code' in error) {
    const code = (error as { code?: unknown }).code;
    if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ECONNREFUSED' || code === 'ECONNABORTED') {
      return true;
    }
  }

  return false;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
  jitter: 0.5,
  isRetryable: isTransientError,
};

/**
 * Build a policy from the defaults
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...overrides };
}

/**
 * Delay before retry number `retry` (0-indexed), before jitter
 */
export function calculateExponentialBackoff(retry: number, policy: RetryPolicy): number {
  const delay = policy.initialDelay * Math.pow(policy.multiplier, retry);
  return Math.min(delay, policy.maxDelay);
}

/**
 * Keep (1 - jitter) of the delay fixed and randomize the rest
 */
export function applyJitter(delay: number, jitter: number, random: () => number): number {
  const fraction = Math.min(Math.max(jitter, 0), 1);
  const fixed = delay * (1 - fraction);
  return Math.round(fixed + delay * fraction * random());
}

function getRetryAfterDelay(error: unknown): number | null {
  if (error instanceof TransientNetworkError && error.retryAfterSeconds && error.retryAfterSeconds > 0) {
    return error.retryAfterSeconds * 1000;
  }
  return null;
}

/**
 * Abortable sleep
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new PipelineCancelledError('Backoff wait'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new PipelineCancelledError('Backoff wait'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Retry an operation with exponential backoff and jitter
 *
 * @throws PipelineCancelledError when the signal fires between attempts
 * @throws RetryExhaustedError when attempts run out or the error is not retryable
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const log = options.logger ?? rootLogger;
  const random = options.random ?? Math.random;
  const wait = options.sleep ?? sleep;
  const { context, signal } = options;
  const contextStr = context ? ` (${context})` : '';
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new PipelineCancelledError(`Operation${contextStr}`);
    }

    try {
      const result = await operation(attempt);
      if (attempt > 1) {
        log.info({ attempt, maxAttempts, context }, `Operation succeeded after ${attempt - 1} retry attempts${contextStr}`);
      }
      return result;
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);

      if (!policy.isRetryable(error)) {
        log.debug({ attempt, maxAttempts, error: message, context }, `Non-retryable error encountered${contextStr}`);
        throw new RetryExhaustedError(attempt, error, false);
      }

      if (attempt >= maxAttempts) {
        log.warn({ attempt, maxAttempts, error: message, context }, `Operation failed after ${attempt} attempts${contextStr}`);
        throw new RetryExhaustedError(attempt, error, true);
      }

      const retryAfter = getRetryAfterDelay(error);
      const delay =
        retryAfter !== null
          ? Math.min(retryAfter, policy.maxDelay)
          : applyJitter(calculateExponentialBackoff(attempt - 1, policy), policy.jitter, random);

      log.warn(
        { attempt, maxAttempts, delay, error: message, context },
        `Retrying operation${contextStr} (attempt ${attempt}/${maxAttempts})`
      );

      await wait(delay, signal);
    }
  }
}
