/**
 * In-process pipeline harness: a scripted source site, a fake embedding
 * model and in-memory stores, shared across runs to simulate restarts
 */

import { InMemoryContentCache } from '../../cache/InMemoryContentCache.js';
import { CheckpointManager } from '../../checkpoint/CheckpointManager.js';
import { InMemoryCheckpointStore } from '../../checkpoint/CheckpointStore.js';
import { InMemoryWorkProductStore } from '../../checkpoint/WorkProductStore.js';
import { ParagraphChunkingStrategy } from '../../chunking/ParagraphChunkingStrategy.js';
import { DocumentEmbedder } from '../../embeddings/DocumentEmbedder.js';
import type { EmbeddingProvider } from '../../embeddings/EmbeddingProvider.js';
import { meanAggregation } from '../../embeddings/aggregation.js';
import { LegislationExtractor } from '../../extraction/LegislationExtractor.js';
import { LegislationListingParser } from '../../extraction/ListingParser.js';
import { HttpStatusError, type FetchOptions, type PageFetcher } from '../../extraction/PageFetcher.js';
import { DualLoader } from '../../loaders/DualLoader.js';
import { InMemoryRelationalStore } from '../../stores/InMemoryRelationalStore.js';
import { InMemoryVectorStore } from '../../vector/InMemoryVectorStore.js';
import { RequestRateLimiter } from '../../utils/rateLimiter.js';
import { PipelineCancelledError } from '../../utils/pipelineErrors.js';
import { PipelineOrchestrator, type OrchestratorOptions } from '../PipelineOrchestrator.js';
import type { StageTransition } from '../../checkpoint/transitions.js';

export const BASE_URL = 'https://legislation.test';
export const SCOPE = { category: 'planning', timePeriod: 'August/2024' };
export const DIMS = 4;

export function listingUrl(page: number): string {
  return page > 1
    ? `${BASE_URL}/all/2024?title=planning&page=${page}`
    : `${BASE_URL}/all/2024?title=planning`;
}

export function documentUrl(number: number): string {
  return `${BASE_URL}/uksi/2024/${number}`;
}

export function listingHtml(numbers: number[], hasNext: boolean): string {
  const rows = numbers
    .map(
      (n) =>
        `<tr><td><a href="/uksi/2024/${n}">The Planning Order ${n}</a></td><td>2024</td><td>${n}</td><td>UK Statutory Instruments</td></tr>`
    )
    .join('\n');
  const next = hasNext ? '<a rel="next" href="?page=next">Next</a>' : '';
  return `<html><body><table><tbody>\n${rows}\n</tbody></table>${next}</body></html>`;
}

export function documentHtml(number: number, body = `Provisions of order ${number}.`): string {
  return `<html><head><title>Order ${number}</title></head><body>
<div id="content">
<h1 class="title">The Planning Order ${number}</h1>
<h2>Part 1 General</h2>
<p>${body}</p>
<p>This Order comes into force on 1st September 2024.</p>
</div>
</body></html>`;
}

export function sectionUrl(number: number, section: number): string {
  return `${documentUrl(number)}/regulation/${section}`;
}

/**
 * Document page whose text lives on section pages linked from its table of contents
 */
export function contentsHtml(number: number, sections: number[]): string {
  const items = sections
    .map((section) => `<li><a href="/uksi/2024/${number}/regulation/${section}">Regulation ${section}</a></li>`)
    .join('');
  return `<html><head><title>Order ${number}</title></head><body>
<div id="content">
<h1 class="title">The Planning Order ${number}</h1>
<div class="LegContents"><ul>${items}<li><a href="#top">Back to top</a></li></ul></div>
</div>
</body></html>`;
}

export function sectionHtml(section: number, body: string): string {
  return `<html><body><div id="content"><h2>Regulation ${section}</h2><p>${body}</p></div></body></html>`;
}

/**
 * Source site double: serves registered pages, records every request
 */
export class ScriptedFetcher implements PageFetcher {
  readonly requests: string[] = [];
  private readonly pages = new Map<string, string>();
  private readonly failures = new Map<string, Error>();
  /** Called before a request is answered */
  onRequest: ((url: string) => void) | null = null;

  set(url: string, body: string): void {
    this.pages.set(url, body);
  }

  fail(url: string, error: Error): void {
    this.failures.set(url, error);
  }

  heal(url: string): void {
    this.failures.delete(url);
  }

  requestsFor(url: string): number {
    return this.requests.filter((requested) => requested === url).length;
  }

  async get(url: string, options: FetchOptions = {}): Promise<Buffer> {
    this.requests.push(url);
    this.onRequest?.(url);
    if (options.signal?.aborted) {
      throw new PipelineCancelledError(`GET ${url}`);
    }
    const failure = this.failures.get(url);
    if (failure) {
      throw failure;
    }
    const body = this.pages.get(url);
    if (body === undefined) {
      throw new HttpStatusError(url, 404);
    }
    return Buffer.from(body, 'utf8');
  }
}

/**
 * Deterministic embedding model: the vector depends only on the text
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  calls = 0;
  private failuresLeft = 0;

  failNext(count: number): void {
    this.failuresLeft = count;
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    this.calls++;
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('model unavailable');
    }
    return texts.map((text) => [text.length, text.split(' ').length, text.charCodeAt(0), 1]);
  }

  getName(): string {
    return 'fake-model';
  }

  getDims(): number {
    return DIMS;
  }
}

/**
 * Serve a listing of `pages` pages, `perPage` documents each, numbered from 1
 */
export function serveListing(fetcher: ScriptedFetcher, pages: number, perPage: number): number[] {
  const numbers: number[] = [];
  for (let page = 1; page <= pages; page++) {
    const onPage = Array.from({ length: perPage }, (_, i) => (page - 1) * perPage + i + 1);
    fetcher.set(listingUrl(page), listingHtml(onPage, page < pages));
    for (const n of onPage) {
      fetcher.set(documentUrl(n), documentHtml(n));
    }
    numbers.push(...onPage);
  }
  return numbers;
}

export interface RunOptions extends Partial<OrchestratorOptions> {
  maxListingPages?: number;
  signal?: AbortSignal;
}

export function createHarness() {
  const fetcher = new ScriptedFetcher();
  const cache = new InMemoryContentCache();
  const provider = new FakeEmbeddingProvider();
  const relational = new InMemoryRelationalStore();
  const vector = new InMemoryVectorStore();
  const checkpointStore = new InMemoryCheckpointStore();
  const workProducts = new InMemoryWorkProductStore();
  const noDelay = { initialDelay: 0, maxDelay: 0 };

  const embedder = new DocumentEmbedder(
    provider,
    new ParagraphChunkingStrategy({ maxChars: 200, overlapChars: 40 }),
    meanAggregation,
    { dimensions: DIMS, batchSize: 8, maxRetries: 1 },
    { retryPolicy: noDelay }
  );
  const loader = new DualLoader(relational, vector, { writeTimeoutMs: 1000, maxRetries: 1 }, { retryPolicy: noDelay });

  /** Transitions committed by the most recent run, in order */
  let transitions: StageTransition[] = [];
  let lastExtractor: LegislationExtractor | null = null;

  /**
   * One process lifetime: fresh extractor and checkpoint manager over the shared state
   */
  async function run(options: RunOptions = {}) {
    const extractor = new LegislationExtractor(
      {
        baseUrl: BASE_URL,
        requestTimeoutMs: 1000,
        fetchMaxRetries: 1,
        maxListingPages: options.maxListingPages ?? 0,
        documentMaxAgeMs: 0,
        listingMaxAgeMs: 0,
      },
      {
        fetcher,
        cache,
        parser: new LegislationListingParser(),
        rateLimiter: new RequestRateLimiter(0),
        retryPolicy: noDelay,
      }
    );
    lastExtractor = extractor;

    const checkpoint = new CheckpointManager(checkpointStore, SCOPE);
    transitions = [];
    const commit = checkpoint.commit.bind(checkpoint);
    checkpoint.commit = (transition) => {
      transitions.push(transition);
      return commit(transition);
    };

    const orchestrator = new PipelineOrchestrator(
      { extractor, embedder, loader, relational, vector, checkpoint, workProducts },
      {
        workers: options.workers ?? { extract: 2, embed: 2, load: 2, queueCapacity: 2 },
        maxItems: options.maxItems ?? 0,
        repairGracePeriodMs: options.repairGracePeriodMs ?? 0,
        readTimeoutMs: 1000,
        skipRepair: options.skipRepair,
        reset: options.reset,
      }
    );
    const summary = await orchestrator.run(options.signal);
    return { summary, checkpoint: checkpoint.current, extractor };
  }

  return {
    fetcher,
    cache,
    provider,
    relational,
    vector,
    checkpointStore,
    workProducts,
    embedder,
    loader,
    run,
    transitions: () => transitions,
    networkFetches: () => lastExtractor?.stats.networkFetches ?? 0,
  };
}
