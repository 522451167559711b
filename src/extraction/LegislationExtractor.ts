/**
 * LegislationExtractor
 *
 * Walks paginated search results and fetches document pages along with the
 * section pages their table of contents links to. Every request goes
 * cache-first, then through the shared politeness limiter, a per-request
 * timeout and the fetch retry policy.
 */

import type { Logger } from 'pino';
import type { ContentCache } from '../cache/ContentCache.js';
import { parseContentsLinks, type ListingEntry, type ListingParser } from './ListingParser.js';
import type { PageFetcher } from './PageFetcher.js';
import type { RequestRateLimiter } from '../utils/rateLimiter.js';
import { retryWithBackoff, createRetryPolicy, isTransientError, RetryExhaustedError } from '../utils/retry.js';
import type { RetryPolicy } from '../utils/retry.js';
import { withTimeout } from '../utils/withTimeout.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { computeContentHash } from '../utils/contentHash.js';
import { FetchExhaustedError, PipelineCancelledError } from '../utils/pipelineErrors.js';
import { parseTimePeriod } from '../config/pipelineConfig.js';
import { logger as rootLogger } from '../utils/logger.js';

export interface ExtractorConfig {
  baseUrl: string;
  requestTimeoutMs: number;
  fetchMaxRetries: number;
  /** 0 = no limit */
  maxListingPages: number;
  documentMaxAgeMs: number;
  listingMaxAgeMs: number;
}

export interface ListingPage {
  /** Cursor that reads this page */
  cursor: string;
  /** Cursor for the following page, null on the last page */
  nextCursor: string | null;
  url: string;
  entries: ListingEntry[];
}

export interface FetchedPage {
  url: string;
  bytes: Buffer;
  contentHash: string;
  fromCache: boolean;
}

export interface SectionPage {
  url: string;
  title: string;
  bytes: Buffer;
  fromCache: boolean;
}

/**
 * A document page plus its section pages in contents order. With sections,
 * `contentHash` covers the document bytes followed by every section's bytes
 * and `fromCache` holds only when every page came from the cache.
 */
export interface FetchedDocument extends FetchedPage {
  sections: SectionPage[];
}

export interface ExtractorStats {
  networkFetches: number;
  cacheHits: number;
  cacheWriteFailures: number;
}

export interface ExtractorDependencies {
  fetcher: PageFetcher;
  cache: ContentCache;
  parser: ListingParser;
  rateLimiter: RequestRateLimiter;
  retryPolicy?: Partial<RetryPolicy>;
  logger?: Logger;
}

const CURSOR_PATTERN = /^page:(\d+)$/;

const SECTION_FETCH_CONCURRENCY = 5;

export function encodeCursor(page: number): string {
  return `page:${page}`;
}

/**
 * @returns the page number a cursor points at; null means start from page 1
 */
export function decodeCursor(cursor: string | null | undefined): number {
  if (!cursor) {
    return 1;
  }
  const match = CURSOR_PATTERN.exec(cursor);
  if (!match) {
    throw new Error(`Unrecognised listing cursor "${cursor}"`);
  }
  return Math.max(1, parseInt(match[1], 10));
}

export class LegislationExtractor {
  private readonly fetcher: PageFetcher;
  private readonly cache: ContentCache;
  private readonly parser: ListingParser;
  private readonly rateLimiter: RequestRateLimiter;
  private readonly retryPolicy: RetryPolicy;
  private readonly log: Logger;
  readonly stats: ExtractorStats = { networkFetches: 0, cacheHits: 0, cacheWriteFailures: 0 };

  constructor(
    private readonly config: ExtractorConfig,
    deps: ExtractorDependencies
  ) {
    this.fetcher = deps.fetcher;
    this.cache = deps.cache;
    this.parser = deps.parser;
    this.rateLimiter = deps.rateLimiter;
    this.retryPolicy = createRetryPolicy({
      maxAttempts: config.fetchMaxRetries + 1,
      isRetryable: isTransientError,
      ...deps.retryPolicy,
    });
    this.log = deps.logger ?? rootLogger.child({ component: 'extractor' });
  }

  /**
   * Search results URL for a category and a Month/YYYY time period
   */
  buildListingUrl(category: string, timePeriod: string, page: number): string {
    const period = parseTimePeriod(timePeriod);
    if (!period) {
      throw new Error(`Invalid time period "${timePeriod}"`);
    }
    const url = new URL(`${this.config.baseUrl}/all/${period.year}`);
    url.searchParams.set('title', category);
    if (page > 1) {
      url.searchParams.set('page', String(page));
    }
    return url.toString();
  }

  /**
   * Listing pages starting at `cursor` (null = first page). Calling again with
   * the same cursor reads the same page again.
   */
  async *listPages(
    category: string,
    timePeriod: string,
    cursor: string | null,
    signal?: AbortSignal
  ): AsyncGenerator<ListingPage> {
    let page = decodeCursor(cursor);
    let pagesRead = 0;

    while (!signal?.aborted) {
      if (this.config.maxListingPages > 0 && pagesRead >= this.config.maxListingPages) {
        this.log.info({ pagesRead, maxListingPages: this.config.maxListingPages }, 'Listing page limit reached');
        return;
      }

      const url = this.buildListingUrl(category, timePeriod, page);
      const fetched = await this.fetchWithCache(url, this.config.listingMaxAgeMs, signal);
      const parsed = this.parser.parse(fetched.bytes.toString('utf8'), url);
      pagesRead++;

      const nextCursor = parsed.hasNextPage && parsed.entries.length > 0 ? encodeCursor(page + 1) : null;
      this.log.debug(
        { url, page, entries: parsed.entries.length, fromCache: fetched.fromCache, nextCursor },
        'Read listing page'
      );

      yield { cursor: encodeCursor(page), nextCursor, url, entries: parsed.entries };

      if (!nextCursor) {
        return;
      }
      page++;
    }
  }

  /**
   * Flattened view of listPages: one item per listed document
   */
  async *listDocuments(
    category: string,
    timePeriod: string,
    cursor: string | null,
    signal?: AbortSignal
  ): AsyncGenerator<ListingEntry> {
    for await (const page of this.listPages(category, timePeriod, cursor, signal)) {
      yield* page.entries;
    }
  }

  /**
   * Raw bytes of a document page and of the sections its table of contents
   * links to, each from the cache when fresh. A section that cannot be
   * fetched fails the whole document.
   *
   * @throws FetchExhaustedError
   * @throws PipelineCancelledError
   */
  async fetchDocument(url: string, signal?: AbortSignal): Promise<FetchedDocument> {
    const main = await this.fetchWithCache(url, this.config.documentMaxAgeMs, signal);
    const links = parseContentsLinks(main.bytes.toString('utf8'), url);
    if (links.length === 0) {
      return { ...main, sections: [] };
    }

    this.log.debug({ url, sections: links.length }, 'Fetching table of contents sections');
    const sections = await mapWithConcurrency(links, SECTION_FETCH_CONCURRENCY, async (link): Promise<SectionPage> => {
      const page = await this.fetchWithCache(link.url, this.config.documentMaxAgeMs, signal);
      return { url: link.url, title: link.title, bytes: page.bytes, fromCache: page.fromCache };
    });

    return {
      ...main,
      contentHash: computeContentHash(Buffer.concat([main.bytes, ...sections.map((section) => section.bytes)])),
      fromCache: main.fromCache && sections.every((section) => section.fromCache),
      sections,
    };
  }

  private async fetchWithCache(url: string, maxAgeMs: number, signal?: AbortSignal): Promise<FetchedPage> {
    try {
      const cached = await this.cache.get(url, { maxAgeMs });
      if (cached) {
        this.stats.cacheHits++;
        return { url, bytes: cached.bytes, contentHash: cached.contentHash, fromCache: true };
      }
    } catch (error) {
      this.log.warn({ url, error }, 'Cache read failed, fetching from network');
    }

    const bytes = await this.fetchFromNetwork(url, signal);

    let contentHash: string;
    try {
      contentHash = await this.cache.put(url, bytes);
    } catch (error) {
      this.stats.cacheWriteFailures++;
      this.log.warn({ url, error }, 'Cache write failed, continuing with fetched bytes');
      contentHash = computeContentHash(bytes);
    }

    return { url, bytes, contentHash, fromCache: false };
  }

  private async fetchFromNetwork(url: string, signal?: AbortSignal): Promise<Buffer> {
    try {
      return await retryWithBackoff(
        async () => {
          await this.rateLimiter.acquire(signal);
          this.stats.networkFetches++;
          const request = this.fetcher.get(url, { signal, timeoutMs: this.config.requestTimeoutMs });
          return withTimeout(request, this.config.requestTimeoutMs, `GET ${url}`);
        },
        this.retryPolicy,
        { context: url, signal, logger: this.log }
      );
    } catch (error) {
      if (error instanceof PipelineCancelledError || signal?.aborted) {
        throw new PipelineCancelledError(`Fetch of ${url}`);
      }
      if (error instanceof RetryExhaustedError) {
        throw new FetchExhaustedError(url, error.attempts, error.lastError);
      }
      throw new FetchExhaustedError(url, 1, error);
    }
  }
}
