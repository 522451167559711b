import { describe, it, expect, vi } from 'vitest';
import {
  applyJitter,
  calculateExponentialBackoff,
  createRetryPolicy,
  isTransientError,
  retryWithBackoff,
  RetryExhaustedError,
} from '../retry.js';
import { PipelineCancelledError, TimeoutError, TransientNetworkError } from '../pipelineErrors.js';
import { HttpStatusError } from '../../extraction/PageFetcher.js';

const transient = () => new TransientNetworkError('https://legislation.test/a', 503, new Error('unavailable'));

describe('retryWithBackoff', () => {
  it('retries transient failures with exponential delays and returns the result', async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce('ok');
    const policy = createRetryPolicy({ maxAttempts: 4, initialDelay: 100, multiplier: 2, jitter: 0 });

    await expect(retryWithBackoff(operation, policy, { sleep })).resolves.toBe('ok');

    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('stops at the first non-retryable error', async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
    const operation = vi.fn(async () => {
      throw new HttpStatusError('https://legislation.test/missing', 404);
    });

    const error = await retryWithBackoff(operation, createRetryPolicy(), { sleep }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 1, retryable: false });
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after maxAttempts and keeps the last error', async () => {
    const last = transient();
    const operation = vi.fn().mockRejectedValueOnce(transient()).mockRejectedValueOnce(transient()).mockRejectedValueOnce(last);
    const policy = createRetryPolicy({ maxAttempts: 3, initialDelay: 0, maxDelay: 0 });

    const error = await retryWithBackoff(operation, policy, { sleep: async () => undefined }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 3, retryable: true, lastError: last });
  });

  it('waits for the server-provided Retry-After, capped at maxDelay', async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
    const limited = new TransientNetworkError('https://legislation.test/a', 429, new Error('slow down'), 2);
    const operation = vi.fn().mockRejectedValueOnce(limited).mockResolvedValueOnce(1);

    await retryWithBackoff(operation, createRetryPolicy({ maxDelay: 30000 }), { sleep });
    expect(sleep.mock.calls[0][0]).toBe(2000);

    sleep.mockClear();
    operation.mockRejectedValueOnce(limited).mockResolvedValueOnce(1);
    await retryWithBackoff(operation, createRetryPolicy({ maxDelay: 500 }), { sleep });
    expect(sleep.mock.calls[0][0]).toBe(500);
  });

  it('does not start an attempt once the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'never');

    await expect(retryWithBackoff(operation, createRetryPolicy(), { signal: controller.signal })).rejects.toBeInstanceOf(
      PipelineCancelledError
    );
    expect(operation).not.toHaveBeenCalled();
  });

  it('passes a cancellation from the operation straight through', async () => {
    const operation = vi.fn(async () => {
      throw new PipelineCancelledError('GET x');
    });

    await expect(retryWithBackoff(operation, createRetryPolicy({ isRetryable: () => true }))).rejects.toThrow(
      'GET x cancelled'
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('interrupts a backoff wait when the signal fires', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      setTimeout(() => controller.abort(), 5);
      throw transient();
    });
    const policy = createRetryPolicy({ maxAttempts: 3, initialDelay: 60000, maxDelay: 60000, jitter: 0 });

    await expect(retryWithBackoff(operation, policy, { signal: controller.signal })).rejects.toBeInstanceOf(
      PipelineCancelledError
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('backoff arithmetic', () => {
  it('doubles from the initial delay and caps at maxDelay', () => {
    const policy = createRetryPolicy({ initialDelay: 1000, multiplier: 2, maxDelay: 5000 });
    expect([0, 1, 2, 3].map((retry) => calculateExponentialBackoff(retry, policy))).toEqual([1000, 2000, 4000, 5000]);
  });

  it('randomizes only the jitter fraction of a delay', () => {
    expect(applyJitter(1000, 0.5, () => 0)).toBe(500);
    expect(applyJitter(1000, 0.5, () => 1)).toBe(1000);
    expect(applyJitter(1000, 0, () => 0.9)).toBe(1000);
  });
});

describe('isTransientError', () => {
  it('treats timeouts, 429, 5xx and connection resets as transient', () => {
    expect(isTransientError(transient())).toBe(true);
    expect(isTransientError(new TimeoutError('GET x', 10))).toBe(true);
    expect(isTransientError({ response: { status: 429 } })).toBe(true);
    expect(isTransientError({ response: { status: 502 } })).toBe(true);
    expect(isTransientError({ code: 'ECONNRESET' })).toBe(true);
  });

  it('treats client errors and plain errors as permanent', () => {
    expect(isTransientError({ response: { status: 404 } })).toBe(false);
    expect(isTransientError(new HttpStatusError('https://legislation.test/a', 410))).toBe(false);
    expect(isTransientError(new Error('boom'))).toBe(false);
  });
});
