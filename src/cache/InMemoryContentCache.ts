import type { CacheEntry, CacheLookupOptions, ContentCache } from './ContentCache.js';
import { isStale } from './ContentCache.js';
import { computeContentHash } from '../utils/contentHash.js';

/**
 * Process-local cache for tests and dry runs
 */
export class InMemoryContentCache implements ContentCache {
  private readonly blobs = new Map<string, Buffer>();
  private readonly latest = new Map<string, { contentHash: string; storedAt: string }>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async get(url: string, options: CacheLookupOptions = {}): Promise<CacheEntry | null> {
    const pointer = this.latest.get(url);
    if (!pointer || isStale(pointer.storedAt, { now: this.now(), ...options })) {
      return null;
    }
    const bytes = this.blobs.get(`${url}\u0000${pointer.contentHash}`);
    return bytes ? { url, contentHash: pointer.contentHash, bytes, storedAt: pointer.storedAt } : null;
  }

  async getByHash(url: string, contentHash: string): Promise<Buffer | null> {
    return this.blobs.get(`${url}\u0000${contentHash}`) ?? null;
  }

  async put(url: string, bytes: Buffer): Promise<string> {
    const contentHash = computeContentHash(bytes);
    this.blobs.set(`${url}\u0000${contentHash}`, Buffer.from(bytes));
    this.latest.set(url, { contentHash, storedAt: this.now().toISOString() });
    return contentHash;
  }

  /**
   * Drop every entry, as if the cache directory had been deleted
   */
  clear(): void {
    this.blobs.clear();
    this.latest.clear();
  }

  get size(): number {
    return this.latest.size;
  }
}
