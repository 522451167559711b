/**
 * FileSystemContentCache
 *
 * Stores raw pages under {root}/{urlKey[0:2]}/{urlKey}/ where urlKey is the
 * sha256 of the URL. Each distinct body is kept as {contentHash}.html and
 * latest.json points at the most recent one. Blobs are immutable once written.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { createHash, randomBytes } from 'crypto';
import { z } from 'zod';
import type { CacheEntry, CacheLookupOptions, ContentCache } from './ContentCache.js';
import { isStale } from './ContentCache.js';
import { computeContentHash } from '../utils/contentHash.js';
import { logger } from '../utils/logger.js';

const pointerSchema = z.object({
  url: z.string(),
  contentHash: z.string().regex(/^[a-f0-9]{64}$/),
  storedAt: z.string(),
  sizeBytes: z.number().int().nonnegative(),
});

type CachePointer = z.infer<typeof pointerSchema>;

function isNotFound(error: unknown): boolean {
  return !!error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT';
}

/**
 * Write file atomically (write to a uniquely named temp file, then rename)
 */
export async function writeFileAtomic(filePath: string, data: Buffer | string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export class FileSystemContentCache implements ContentCache {
  constructor(
    private readonly basePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  private urlDirectory(url: string): string {
    const urlKey = createHash('sha256').update(url, 'utf8').digest('hex');
    return join(this.basePath, urlKey.slice(0, 2), urlKey);
  }

  private async readPointer(url: string): Promise<CachePointer | null> {
    const pointerPath = join(this.urlDirectory(url), 'latest.json');
    let raw: string;
    try {
      raw = await fs.readFile(pointerPath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    try {
      const parsed = pointerSchema.safeParse(JSON.parse(raw));
      if (parsed.success && parsed.data.url === url) {
        return parsed.data;
      }
    } catch {
      // unparseable pointer, handled below
    }
    logger.warn({ url, pointerPath }, 'Ignoring corrupt cache pointer');
    return null;
  }

  async get(url: string, options: CacheLookupOptions = {}): Promise<CacheEntry | null> {
    const pointer = await this.readPointer(url);
    if (!pointer) {
      return null;
    }
    if (isStale(pointer.storedAt, { now: this.now(), ...options })) {
      logger.debug({ url, storedAt: pointer.storedAt }, 'Cache entry is stale');
      return null;
    }

    const bytes = await this.getByHash(url, pointer.contentHash);
    if (!bytes) {
      return null;
    }
    return { url, contentHash: pointer.contentHash, bytes, storedAt: pointer.storedAt };
  }

  /**
   * Read a blob and verify its hash; a mismatch or missing file is a miss
   */
  async getByHash(url: string, contentHash: string): Promise<Buffer | null> {
    if (!/^[a-f0-9]{64}$/.test(contentHash)) {
      throw new Error(`Invalid sha256 format: ${contentHash}`);
    }

    const blobPath = join(this.urlDirectory(url), `${contentHash}.html`);
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(blobPath);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    if (computeContentHash(bytes) !== contentHash) {
      logger.warn({ url, contentHash, blobPath }, 'Cache blob failed integrity check, treating as miss');
      return null;
    }
    return bytes;
  }

  async put(url: string, bytes: Buffer): Promise<string> {
    const contentHash = computeContentHash(bytes);
    const directory = this.urlDirectory(url);
    const blobPath = join(directory, `${contentHash}.html`);

    await fs.mkdir(directory, { recursive: true });

    const exists = await fs
      .access(blobPath)
      .then(() => true)
      .catch(() => false);
    if (!exists) {
      await writeFileAtomic(blobPath, bytes);
    }

    const pointer: CachePointer = {
      url,
      contentHash,
      storedAt: this.now().toISOString(),
      sizeBytes: bytes.length,
    };
    await writeFileAtomic(join(directory, 'latest.json'), JSON.stringify(pointer, null, 2));

    logger.debug({ url, contentHash, sizeBytes: bytes.length }, 'Cached page');
    return contentHash;
  }
}
