/**
 * Raw page cache keyed by (URL, content hash)
 *
 * A miss is never fatal: callers fall back to the network, and a failed `put`
 * is surfaced to the caller, who carries on with the bytes it already has.
 */
export interface CacheEntry {
  url: string;
  contentHash: string;
  bytes: Buffer;
  /** ISO timestamp of the write */
  storedAt: string;
}

export interface CacheLookupOptions {
  /** Entries older than this are reported as a miss; 0 or undefined means never stale */
  maxAgeMs?: number;
  now?: Date;
}

export interface ContentCache {
  /**
   * Latest bytes stored for a URL
   */
  get(url: string, options?: CacheLookupOptions): Promise<CacheEntry | null>;

  /**
   * Bytes stored for a URL under a specific content hash
   */
  getByHash(url: string, contentHash: string): Promise<Buffer | null>;

  /**
   * Store bytes for a URL and return their content hash
   */
  put(url: string, bytes: Buffer): Promise<string>;
}

export function isStale(storedAt: string, options: CacheLookupOptions = {}): boolean {
  if (!options.maxAgeMs || options.maxAgeMs <= 0) {
    return false;
  }
  const now = options.now ?? new Date();
  return now.getTime() - new Date(storedAt).getTime() > options.maxAgeMs;
}
