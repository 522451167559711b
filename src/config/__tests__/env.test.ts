import { describe, it, expect } from 'vitest';
import { parseEnv } from '../env.js';
import { ConfigurationError } from '../../utils/pipelineErrors.js';

function problemsOf(source: NodeJS.ProcessEnv): string[] {
  try {
    parseEnv(source);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.problems;
    }
    throw error;
  }
  return [];
}

describe('parseEnv', () => {
  it('fills in defaults for everything optional', () => {
    const env = parseEnv({ NODE_ENV: 'test' });

    expect(env.NODE_ENV).toBe('test');
    expect(env.DATABASE_PORT).toBe(5432);
    expect(env.DATABASE_NAME).toBe('legislation_db');
    expect(env.LEGISLATION_BASE_URL).toBe('https://www.legislation.gov.uk');
    expect(env.LEGISLATION_CATEGORY).toBe('planning');
    expect(env.LEGISLATION_TIME_PERIOD).toBe('August/2024');
    expect(env.DOCUMENT_CACHE_MAX_AGE_MS).toBe(0);
    expect(env.LISTING_CACHE_MAX_AGE_MS).toBe(6 * 60 * 60 * 1000);
    expect(env.EMBEDDING_DIMENSIONS).toBe(384);
    expect(env.EMBEDDING_AGGREGATION).toBe('mean');
    expect(env.VECTOR_TABLE).toBe('legislation_embeddings');
  });

  it('points the vector store at the relational database unless told otherwise', () => {
    const env = parseEnv({
      NODE_ENV: 'test',
      DATABASE_HOST: 'db.internal',
      DATABASE_PORT: '6543',
      DATABASE_PASSWORD: 'test-secret',
    });
    expect(env.VECTOR_DATABASE_HOST).toBe('db.internal');
    expect(env.VECTOR_DATABASE_PORT).toBe(6543);
    expect(env.VECTOR_DATABASE_PASSWORD).toBe('test-secret');

    const split = parseEnv({ NODE_ENV: 'test', DATABASE_HOST: 'db.internal', VECTOR_DATABASE_HOST: 'vectors.internal' });
    expect(split.VECTOR_DATABASE_HOST).toBe('vectors.internal');
  });

  it('strips trailing slashes from the base URL', () => {
    expect(parseEnv({ NODE_ENV: 'test', LEGISLATION_BASE_URL: 'https://legislation.test//' }).LEGISLATION_BASE_URL).toBe(
      'https://legislation.test'
    );
  });

  it('requires a database password outside tests', () => {
    expect(problemsOf({ NODE_ENV: 'production' })).toEqual(['DATABASE_PASSWORD: Environment variable is required.']);
    expect(problemsOf({ NODE_ENV: 'production', DATABASE_PASSWORD: 'test-secret' })).toEqual([]);
  });

  it('reports every invalid value at once', () => {
    const problems = problemsOf({
      NODE_ENV: 'test',
      DATABASE_PORT: '70000',
      VECTOR_TABLE: 'bad-name',
      EMBEDDING_AGGREGATION: 'median',
      EXTRACT_WORKERS: '0',
      REQUEST_DELAY_MS: '-5',
    });

    expect(problems).toEqual([
      'DATABASE_PORT: Invalid value "70000". Must be between 1 and 65535.',
      'VECTOR_DATABASE_PORT: Invalid value "70000". Must be between 1 and 65535.',
      'VECTOR_TABLE: Invalid value "bad-name". Only alphanumeric characters and underscores are allowed.',
      'EMBEDDING_AGGREGATION: Invalid value "median". Must be mean or max.',
      'EXTRACT_WORKERS: Invalid value "0". Must be at least 1.',
      'REQUEST_DELAY_MS: Invalid value "-5". Must not be negative.',
    ]);
  });

  it('rejects an unknown NODE_ENV and a non-http base URL', () => {
    expect(problemsOf({ NODE_ENV: 'staging', DATABASE_PASSWORD: 'test-secret', LEGISLATION_BASE_URL: 'ftp://x' })).toEqual([
      'NODE_ENV: Invalid value "staging". Must be development, production, or test.',
      'LEGISLATION_BASE_URL: Invalid value "ftp://x". Must be an http(s) URL.',
    ]);
  });
});
