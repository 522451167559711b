import { describe, it, expect } from 'vitest';
import { canonicalizeUrl, computeContentHash, documentIdFromUrl, hasContentChanged } from '../contentHash.js';

describe('computeContentHash', () => {
  it('is the sha256 hex digest of the bytes', () => {
    expect(computeContentHash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    expect(computeContentHash(Buffer.from('abc'))).toBe(computeContentHash('abc'));
  });
});

describe('canonicalizeUrl', () => {
  it('drops fragments and trailing slashes', () => {
    expect(canonicalizeUrl('https://legislation.test/uksi/2024/1/#section-2')).toBe('https://legislation.test/uksi/2024/1');
    expect(canonicalizeUrl(' https://legislation.test/uksi/2024/1 ')).toBe('https://legislation.test/uksi/2024/1');
  });

  it('keeps the root path and query strings', () => {
    expect(canonicalizeUrl('https://legislation.test/')).toBe('https://legislation.test/');
    expect(canonicalizeUrl('https://legislation.test/all/2024?title=planning')).toBe(
      'https://legislation.test/all/2024?title=planning'
    );
  });
});

describe('documentIdFromUrl', () => {
  it('maps spellings of the same page to one id', () => {
    const id = documentIdFromUrl('https://legislation.test/uksi/2024/1');
    expect(documentIdFromUrl('https://legislation.test/uksi/2024/1/')).toBe(id);
    expect(documentIdFromUrl('https://legislation.test/uksi/2024/1#part-1')).toBe(id);
    expect(documentIdFromUrl('https://legislation.test/uksi/2024/2')).not.toBe(id);
    expect(id).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('hasContentChanged', () => {
  it('reports a change when there is no previous hash', () => {
    expect(hasContentChanged('a', null)).toBe(true);
    expect(hasContentChanged('a', undefined)).toBe(true);
    expect(hasContentChanged('a', 'a')).toBe(false);
    expect(hasContentChanged('a', 'b')).toBe(true);
  });
});
