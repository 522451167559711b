import crypto from 'crypto';

/**
 * SHA-256 hex digest of raw fetched bytes
 */
export function computeContentHash(bytes: Buffer | string): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

/**
 * Canonical form of a source URL: no fragment, no trailing slash on the path.
 * Two spellings of the same page must map to the same document id.
 */
export function canonicalizeUrl(url: string): string {
  const parsed = new URL(url.trim());
  parsed.hash = '';
  if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, '');
  }
  return parsed.toString();
}

/**
 * Stable document id derived from the canonical source URL
 */
export function documentIdFromUrl(url: string): string {
  return crypto.createHash('sha256').update(canonicalizeUrl(url), 'utf8').digest('hex');
}

/**
 * Detect if document content has changed by comparing hashes
 *
 * @returns true when there is no previous hash or the hashes differ
 */
export function hasContentChanged(newHash: string, oldHash?: string | null): boolean {
  if (!oldHash) {
    return true;
  }
  return newHash !== oldHash;
}
