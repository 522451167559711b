/**
 * Environment Variable Validation
 *
 * Manual parsing of the pipeline's environment. Every problem is collected and
 * reported in one ConfigurationError so a misconfigured run fails before it
 * touches the network or either store.
 */

// Load dotenv early so values from .env are visible to everything below
import * as dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError } from '../utils/pipelineErrors.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

export type AggregationName = 'mean' | 'max';

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: 'development' | 'production' | 'test';

  // Relational store
  DATABASE_HOST: string;
  DATABASE_PORT: number;
  DATABASE_NAME: string;
  DATABASE_USER: string;
  DATABASE_PASSWORD: string;
  DATABASE_POOL_MAX: number;
  DATABASE_SSL: boolean;

  // Vector store (pgvector)
  VECTOR_DATABASE_HOST: string;
  VECTOR_DATABASE_PORT: number;
  VECTOR_DATABASE_NAME: string;
  VECTOR_DATABASE_USER: string;
  VECTOR_DATABASE_PASSWORD: string;
  VECTOR_SCHEMA: string;
  VECTOR_TABLE: string;

  // Crawl
  LEGISLATION_BASE_URL: string;
  LEGISLATION_CATEGORY: string;
  LEGISLATION_TIME_PERIOD: string;
  MAX_LISTING_PAGES: number;
  MAX_ITEMS: number;
  REQUEST_DELAY_MS: number;
  REQUEST_TIMEOUT_MS: number;
  FETCH_MAX_RETRIES: number;
  USER_AGENT: string;

  // Persisted state
  CACHE_DIR: string;
  DOCUMENT_CACHE_MAX_AGE_MS: number;
  LISTING_CACHE_MAX_AGE_MS: number;
  CHECKPOINT_DIR: string;
  WORK_DIR: string;

  // Embedding
  EMBEDDING_MODEL: string;
  EMBEDDING_DIMENSIONS: number;
  EMBEDDING_CHUNK_MAX_CHARS: number;
  EMBEDDING_CHUNK_OVERLAP_CHARS: number;
  EMBEDDING_BATCH_SIZE: number;
  EMBEDDING_MAX_RETRIES: number;
  EMBEDDING_AGGREGATION: AggregationName;

  // Workers and stores
  EXTRACT_WORKERS: number;
  EMBED_WORKERS: number;
  LOAD_WORKERS: number;
  QUEUE_CAPACITY: number;
  STORE_WRITE_TIMEOUT_MS: number;
  STORE_MAX_RETRIES: number;
  REPAIR_GRACE_PERIOD_MS: number;
}

const DEFAULT_USER_AGENT = 'legislation-etl/0.1 (+https://www.legislation.gov.uk/developer)';

/**
 * Parse and validate an environment
 *
 * @throws ConfigurationError listing every invalid or missing value
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const errors: string[] = [];

  const nodeEnv = source.NODE_ENV || 'development';
  if (nodeEnv !== 'development' && nodeEnv !== 'production' && nodeEnv !== 'test') {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const databasePort = parseNumericEnv(source.DATABASE_PORT, 5432);
  if (databasePort < 1 || databasePort > 65535) {
    errors.push(`DATABASE_PORT: Invalid value "${source.DATABASE_PORT}". Must be between 1 and 65535.`);
  }

  const databasePassword = source.DATABASE_PASSWORD || '';
  if (!databasePassword && nodeEnv !== 'test') {
    errors.push('DATABASE_PASSWORD: Environment variable is required.');
  }

  const vectorPort = parseNumericEnv(source.VECTOR_DATABASE_PORT, databasePort);
  if (vectorPort < 1 || vectorPort > 65535) {
    errors.push(`VECTOR_DATABASE_PORT: Invalid value "${source.VECTOR_DATABASE_PORT ?? vectorPort}". Must be between 1 and 65535.`);
  }

  const vectorSchema = source.VECTOR_SCHEMA || 'vector';
  const vectorTable = source.VECTOR_TABLE || 'legislation_embeddings';
  for (const [key, value] of [['VECTOR_SCHEMA', vectorSchema], ['VECTOR_TABLE', vectorTable]] as const) {
    if (!/^[a-z0-9_]+$/i.test(value)) {
      errors.push(`${key}: Invalid value "${value}". Only alphanumeric characters and underscores are allowed.`);
    }
  }

  const baseUrl = source.LEGISLATION_BASE_URL || 'https://www.legislation.gov.uk';
  if (!/^https?:\/\//.test(baseUrl)) {
    errors.push(`LEGISLATION_BASE_URL: Invalid value "${baseUrl}". Must be an http(s) URL.`);
  }

  const aggregation = source.EMBEDDING_AGGREGATION || 'mean';
  if (aggregation !== 'mean' && aggregation !== 'max') {
    errors.push(`EMBEDDING_AGGREGATION: Invalid value "${aggregation}". Must be mean or max.`);
  }

  const positive: Array<[keyof Env, number]> = [];
  const nonNegative: Array<[keyof Env, number]> = [];

  const env: Env = {
    NODE_ENV: nodeEnv === 'production' || nodeEnv === 'test' ? nodeEnv : 'development',

    DATABASE_HOST: source.DATABASE_HOST || 'localhost',
    DATABASE_PORT: databasePort,
    DATABASE_NAME: source.DATABASE_NAME || 'legislation_db',
    DATABASE_USER: source.DATABASE_USER || 'postgres',
    DATABASE_PASSWORD: databasePassword,
    DATABASE_POOL_MAX: parseNumericEnv(source.DATABASE_POOL_MAX, 10),
    DATABASE_SSL: parseBooleanEnv(source.DATABASE_SSL, false),

    VECTOR_DATABASE_HOST: source.VECTOR_DATABASE_HOST || source.DATABASE_HOST || 'localhost',
    VECTOR_DATABASE_PORT: vectorPort,
    VECTOR_DATABASE_NAME: source.VECTOR_DATABASE_NAME || source.DATABASE_NAME || 'legislation_db',
    VECTOR_DATABASE_USER: source.VECTOR_DATABASE_USER || source.DATABASE_USER || 'postgres',
    VECTOR_DATABASE_PASSWORD: source.VECTOR_DATABASE_PASSWORD || databasePassword,
    VECTOR_SCHEMA: vectorSchema,
    VECTOR_TABLE: vectorTable,

    LEGISLATION_BASE_URL: baseUrl.replace(/\/+$/, ''),
    LEGISLATION_CATEGORY: source.LEGISLATION_CATEGORY || 'planning',
    LEGISLATION_TIME_PERIOD: source.LEGISLATION_TIME_PERIOD || 'August/2024',
    MAX_LISTING_PAGES: parseNumericEnv(source.MAX_LISTING_PAGES, 0),
    MAX_ITEMS: parseNumericEnv(source.MAX_ITEMS, 0),
    REQUEST_DELAY_MS: parseNumericEnv(source.REQUEST_DELAY_MS, 1000),
    REQUEST_TIMEOUT_MS: parseNumericEnv(source.REQUEST_TIMEOUT_MS, 30000),
    FETCH_MAX_RETRIES: parseNumericEnv(source.FETCH_MAX_RETRIES, 3),
    USER_AGENT: source.USER_AGENT || DEFAULT_USER_AGENT,

    CACHE_DIR: source.CACHE_DIR || './data/cache',
    DOCUMENT_CACHE_MAX_AGE_MS: parseNumericEnv(source.DOCUMENT_CACHE_MAX_AGE_MS, 0),
    LISTING_CACHE_MAX_AGE_MS: parseNumericEnv(source.LISTING_CACHE_MAX_AGE_MS, 6 * 60 * 60 * 1000),
    CHECKPOINT_DIR: source.CHECKPOINT_DIR || './data/checkpoints',
    WORK_DIR: source.WORK_DIR || './data/work',

    EMBEDDING_MODEL: source.EMBEDDING_MODEL || 'Xenova/all-MiniLM-L6-v2',
    EMBEDDING_DIMENSIONS: parseNumericEnv(source.EMBEDDING_DIMENSIONS, 384),
    EMBEDDING_CHUNK_MAX_CHARS: parseNumericEnv(source.EMBEDDING_CHUNK_MAX_CHARS, 1000),
    EMBEDDING_CHUNK_OVERLAP_CHARS: parseNumericEnv(source.EMBEDDING_CHUNK_OVERLAP_CHARS, 100),
    EMBEDDING_BATCH_SIZE: parseNumericEnv(source.EMBEDDING_BATCH_SIZE, 64),
    EMBEDDING_MAX_RETRIES: parseNumericEnv(source.EMBEDDING_MAX_RETRIES, 3),
    EMBEDDING_AGGREGATION: aggregation === 'max' ? 'max' : 'mean',

    EXTRACT_WORKERS: parseNumericEnv(source.EXTRACT_WORKERS, 4),
    EMBED_WORKERS: parseNumericEnv(source.EMBED_WORKERS, 2),
    LOAD_WORKERS: parseNumericEnv(source.LOAD_WORKERS, 4),
    QUEUE_CAPACITY: parseNumericEnv(source.QUEUE_CAPACITY, 16),
    STORE_WRITE_TIMEOUT_MS: parseNumericEnv(source.STORE_WRITE_TIMEOUT_MS, 30000),
    STORE_MAX_RETRIES: parseNumericEnv(source.STORE_MAX_RETRIES, 3),
    REPAIR_GRACE_PERIOD_MS: parseNumericEnv(source.REPAIR_GRACE_PERIOD_MS, 0),
  };

  positive.push(
    ['DATABASE_POOL_MAX', env.DATABASE_POOL_MAX],
    ['EMBEDDING_DIMENSIONS', env.EMBEDDING_DIMENSIONS],
    ['EMBEDDING_CHUNK_MAX_CHARS', env.EMBEDDING_CHUNK_MAX_CHARS],
    ['EMBEDDING_BATCH_SIZE', env.EMBEDDING_BATCH_SIZE],
    ['EXTRACT_WORKERS', env.EXTRACT_WORKERS],
    ['EMBED_WORKERS', env.EMBED_WORKERS],
    ['LOAD_WORKERS', env.LOAD_WORKERS],
    ['QUEUE_CAPACITY', env.QUEUE_CAPACITY]
  );
  nonNegative.push(
    ['MAX_LISTING_PAGES', env.MAX_LISTING_PAGES],
    ['MAX_ITEMS', env.MAX_ITEMS],
    ['REQUEST_DELAY_MS', env.REQUEST_DELAY_MS],
    ['REQUEST_TIMEOUT_MS', env.REQUEST_TIMEOUT_MS],
    ['FETCH_MAX_RETRIES', env.FETCH_MAX_RETRIES],
    ['DOCUMENT_CACHE_MAX_AGE_MS', env.DOCUMENT_CACHE_MAX_AGE_MS],
    ['LISTING_CACHE_MAX_AGE_MS', env.LISTING_CACHE_MAX_AGE_MS],
    ['EMBEDDING_CHUNK_OVERLAP_CHARS', env.EMBEDDING_CHUNK_OVERLAP_CHARS],
    ['EMBEDDING_MAX_RETRIES', env.EMBEDDING_MAX_RETRIES],
    ['STORE_WRITE_TIMEOUT_MS', env.STORE_WRITE_TIMEOUT_MS],
    ['STORE_MAX_RETRIES', env.STORE_MAX_RETRIES],
    ['REPAIR_GRACE_PERIOD_MS', env.REPAIR_GRACE_PERIOD_MS]
  );

  for (const [key, value] of positive) {
    if (value < 1) {
      errors.push(`${key}: Invalid value "${source[key] ?? value}". Must be at least 1.`);
    }
  }
  for (const [key, value] of nonNegative) {
    if (value < 0) {
      errors.push(`${key}: Invalid value "${source[key] ?? value}". Must not be negative.`);
    }
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }

  return env;
}

let cachedEnv: Env | null = null;

/**
 * Validate process.env once and cache the result
 */
export function validateEnv(): Env {
  if (!cachedEnv) {
    cachedEnv = parseEnv(process.env);
  }
  return cachedEnv;
}

/**
 * Reset cached environment (for testing)
 */
export function resetEnv(): void {
  cachedEnv = null;
}

export function isTest(): boolean {
  return process.env.NODE_ENV === 'test';
}
