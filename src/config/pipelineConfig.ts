/**
 * Pipeline configuration
 *
 * Precedence: CLI flags, then the optional JSON config file, then the environment.
 */

import { promises as fs } from 'fs';
import type { PoolConfig } from 'pg';
import { parseEnv, validateEnv, type AggregationName, type Env } from './env.js';
import { configFileSchema, type ConfigFile } from '../validation/configFileSchema.js';
import { ConfigurationError } from '../utils/pipelineErrors.js';

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export type MonthName = (typeof MONTHS)[number];

export interface TimePeriod {
  month: MonthName;
  year: number;
}

export interface CrawlConfig {
  baseUrl: string;
  category: string;
  timePeriod: string;
  maxListingPages: number;
  maxItems: number;
  requestDelayMs: number;
  requestTimeoutMs: number;
  fetchMaxRetries: number;
  userAgent: string;
}

export interface EmbeddingConfig {
  model: string;
  dimensions: number;
  chunkMaxChars: number;
  chunkOverlapChars: number;
  batchSize: number;
  maxRetries: number;
  aggregation: AggregationName;
}

export interface VectorStoreConnection {
  pool: PoolConfig;
  schema: string;
  table: string;
}

export interface PipelineConfig {
  crawl: CrawlConfig;
  cache: { dir: string; documentMaxAgeMs: number; listingMaxAgeMs: number };
  state: { checkpointDir: string; workDir: string };
  embedding: EmbeddingConfig;
  workers: { extract: number; embed: number; load: number; queueCapacity: number };
  stores: { writeTimeoutMs: number; maxRetries: number; repairGracePeriodMs: number };
  relational: PoolConfig;
  vector: VectorStoreConnection;
}

/**
 * Values taken from command line flags
 */
export interface CliOverrides {
  category?: string;
  timePeriod?: string;
  maxItems?: number;
  maxListingPages?: number;
}

/**
 * Parse "Month/YYYY", e.g. "August/2024"
 *
 * @returns null when the value is not in that form
 */
export function parseTimePeriod(value: string): TimePeriod | null {
  const match = /^([A-Za-z]+)\/(\d{4})$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const month = MONTHS.find((name) => name.toLowerCase() === match[1].toLowerCase());
  if (!month) {
    return null;
  }
  return { month, year: parseInt(match[2], 10) };
}

/**
 * Read and validate a JSON config file
 *
 * @throws ConfigurationError when the file is unreadable or does not match the schema
 */
export async function loadConfigFile(path: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError([`Config file ${path}: ${error instanceof Error ? error.message : String(error)}`]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError([`Config file ${path}: invalid JSON (${error instanceof Error ? error.message : String(error)})`]);
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `Config file ${path}: ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function poolFromEnv(env: Env, side: 'relational' | 'vector'): PoolConfig {
  const common: PoolConfig = {
    max: env.DATABASE_POOL_MAX,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    keepAlive: true,
    ...(env.DATABASE_SSL && { ssl: { rejectUnauthorized: false } }),
  };
  if (side === 'relational') {
    return {
      ...common,
      host: env.DATABASE_HOST,
      port: env.DATABASE_PORT,
      database: env.DATABASE_NAME,
      user: env.DATABASE_USER,
      password: env.DATABASE_PASSWORD,
    };
  }
  return {
    ...common,
    host: env.VECTOR_DATABASE_HOST,
    port: env.VECTOR_DATABASE_PORT,
    database: env.VECTOR_DATABASE_NAME,
    user: env.VECTOR_DATABASE_USER,
    password: env.VECTOR_DATABASE_PASSWORD,
  };
}

/**
 * Merge environment, config file and CLI flags, then check cross-field rules
 *
 * @throws ConfigurationError
 */
export function buildPipelineConfig(env: Env, file: ConfigFile = {}, cli: CliOverrides = {}): PipelineConfig {
  const config: PipelineConfig = {
    crawl: {
      baseUrl: env.LEGISLATION_BASE_URL,
      category: env.LEGISLATION_CATEGORY,
      timePeriod: env.LEGISLATION_TIME_PERIOD,
      maxListingPages: env.MAX_LISTING_PAGES,
      maxItems: env.MAX_ITEMS,
      requestDelayMs: env.REQUEST_DELAY_MS,
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
      fetchMaxRetries: env.FETCH_MAX_RETRIES,
      userAgent: env.USER_AGENT,
      ...file.crawl,
      ...(cli.category !== undefined && { category: cli.category }),
      ...(cli.timePeriod !== undefined && { timePeriod: cli.timePeriod }),
      ...(cli.maxItems !== undefined && { maxItems: cli.maxItems }),
      ...(cli.maxListingPages !== undefined && { maxListingPages: cli.maxListingPages }),
    },
    cache: {
      dir: env.CACHE_DIR,
      documentMaxAgeMs: env.DOCUMENT_CACHE_MAX_AGE_MS,
      listingMaxAgeMs: env.LISTING_CACHE_MAX_AGE_MS,
      ...file.cache,
    },
    state: {
      checkpointDir: env.CHECKPOINT_DIR,
      workDir: env.WORK_DIR,
      ...file.state,
    },
    embedding: {
      model: env.EMBEDDING_MODEL,
      dimensions: env.EMBEDDING_DIMENSIONS,
      chunkMaxChars: env.EMBEDDING_CHUNK_MAX_CHARS,
      chunkOverlapChars: env.EMBEDDING_CHUNK_OVERLAP_CHARS,
      batchSize: env.EMBEDDING_BATCH_SIZE,
      maxRetries: env.EMBEDDING_MAX_RETRIES,
      aggregation: env.EMBEDDING_AGGREGATION,
      ...file.embedding,
    },
    workers: {
      extract: env.EXTRACT_WORKERS,
      embed: env.EMBED_WORKERS,
      load: env.LOAD_WORKERS,
      queueCapacity: env.QUEUE_CAPACITY,
      ...file.workers,
    },
    stores: {
      writeTimeoutMs: env.STORE_WRITE_TIMEOUT_MS,
      maxRetries: env.STORE_MAX_RETRIES,
      repairGracePeriodMs: env.REPAIR_GRACE_PERIOD_MS,
      ...file.stores,
    },
    relational: poolFromEnv(env, 'relational'),
    vector: {
      pool: poolFromEnv(env, 'vector'),
      schema: env.VECTOR_SCHEMA,
      table: env.VECTOR_TABLE,
    },
  };

  const errors: string[] = [];

  if (!config.crawl.category.trim()) {
    errors.push('category: Must not be empty.');
  }
  if (!parseTimePeriod(config.crawl.timePeriod)) {
    errors.push(`timePeriod: Invalid value "${config.crawl.timePeriod}". Expected Month/YYYY, e.g. August/2024.`);
  }
  if (cli.maxItems !== undefined && (!Number.isInteger(cli.maxItems) || cli.maxItems < 0)) {
    errors.push(`--max-items: Invalid value "${cli.maxItems}". Must be a non-negative integer.`);
  }
  if (cli.maxListingPages !== undefined && (!Number.isInteger(cli.maxListingPages) || cli.maxListingPages < 0)) {
    errors.push(`--max-pages: Invalid value "${cli.maxListingPages}". Must be a non-negative integer.`);
  }
  if (config.embedding.chunkOverlapChars >= config.embedding.chunkMaxChars) {
    errors.push(
      `EMBEDDING_CHUNK_OVERLAP_CHARS (${config.embedding.chunkOverlapChars}) must be smaller than EMBEDDING_CHUNK_MAX_CHARS (${config.embedding.chunkMaxChars}).`
    );
  }
  if (config.cache.dir === config.state.checkpointDir) {
    errors.push('CACHE_DIR and CHECKPOINT_DIR must be different locations.');
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  return config;
}

/**
 * Load the full configuration for a run
 */
export async function loadPipelineConfig(options: {
  configFile?: string;
  cli?: CliOverrides;
  env?: NodeJS.ProcessEnv;
} = {}): Promise<PipelineConfig> {
  const env = options.env ? parseEnv(options.env) : validateEnv();
  const file = options.configFile ? await loadConfigFile(options.configFile) : {};
  return buildPipelineConfig(env, file, options.cli);
}
