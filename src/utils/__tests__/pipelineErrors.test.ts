import { describe, it, expect } from 'vitest';
import {
  CleaningFailedError,
  ConfigurationError,
  EmbeddingExhaustedError,
  FetchExhaustedError,
  PipelineCancelledError,
  StoreWriteError,
  TimeoutError,
  TransientNetworkError,
  isCancellation,
  toFailureKind,
} from '../pipelineErrors.js';
import { attempt } from '../stageResult.js';

describe('toFailureKind', () => {
  it('maps each error class onto the failure taxonomy', () => {
    const url = 'https://legislation.test/uksi/2024/1';
    expect(toFailureKind(new FetchExhaustedError(url, 3, new Error('HTTP 503')))).toBe('FetchExhausted');
    expect(toFailureKind(new EmbeddingExhaustedError('uksi-2024-1', 2, new Error('model unavailable')))).toBe('EmbeddingExhausted');
    expect(toFailureKind(new CleaningFailedError('uksi-2024-1', 'empty document'))).toBe('CleaningFailed');
    expect(toFailureKind(new StoreWriteError('vector', 'uksi-2024-1', new Error('offline')))).toBe('StoreWriteError');
    expect(toFailureKind(new ConfigurationError(['DATABASE_URL is required']))).toBe('ConfigurationError');
    expect(toFailureKind(new TransientNetworkError(url, 502, new Error('HTTP 502')))).toBe('TransientNetworkError');
    expect(toFailureKind(new TimeoutError('GET', 10))).toBe('TransientNetworkError');
    expect(toFailureKind('boom')).toBe('Unknown');
  });
});

describe('error messages', () => {
  it('name the document, the attempts and the last cause', () => {
    expect(new FetchExhaustedError('https://legislation.test/a', 4, new Error('HTTP 503')).message).toBe(
      'Fetching https://legislation.test/a failed after 4 attempt(s): HTTP 503'
    );
    expect(new TransientNetworkError('https://legislation.test/a', undefined, new Error('socket hang up')).message).toBe(
      'Transient failure fetching https://legislation.test/a: socket hang up'
    );
    expect(new ConfigurationError(['A is required', 'B must be positive']).message).toBe(
      'Invalid configuration:\n  - A is required\n  - B must be positive'
    );
    expect(new PipelineCancelledError().message).toBe('Pipeline run cancelled');
  });

  it('recognises cancellation', () => {
    expect(isCancellation(new PipelineCancelledError('Repair pass'))).toBe(true);
    expect(isCancellation(new Error('Repair pass cancelled'))).toBe(false);
  });
});

describe('attempt', () => {
  it('captures the value or the classified failure', async () => {
    expect(await attempt(async () => 42)).toEqual({ ok: true, value: 42 });

    const error = new CleaningFailedError('uksi-2024-1', 'no markup found');
    expect(await attempt(async () => Promise.reject(error))).toEqual({
      ok: false,
      kind: 'CleaningFailed',
      message: 'Cleaning document uksi-2024-1 failed: no markup found',
      error,
    });
  });
});
