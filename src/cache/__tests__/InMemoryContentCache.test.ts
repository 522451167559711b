import { describe, it, expect } from 'vitest';
import { InMemoryContentCache } from '../InMemoryContentCache.js';
import { isStale } from '../ContentCache.js';

describe('InMemoryContentCache', () => {
  it('serves the latest version and keeps older ones by hash', async () => {
    const cache = new InMemoryContentCache(() => new Date('2024-09-01T00:00:00.000Z'));
    const first = await cache.put('https://legislation.test/a', Buffer.from('one'));
    const second = await cache.put('https://legislation.test/a', Buffer.from('two'));

    const entry = await cache.get('https://legislation.test/a');
    expect(entry?.contentHash).toBe(second);
    expect(entry?.bytes.toString()).toBe('two');
    expect((await cache.getByHash('https://legislation.test/a', first))?.toString()).toBe('one');
    expect(cache.size).toBe(1);
  });

  it('forgets everything on clear', async () => {
    const cache = new InMemoryContentCache();
    await cache.put('https://legislation.test/a', Buffer.from('one'));
    cache.clear();

    expect(await cache.get('https://legislation.test/a')).toBeNull();
    expect(cache.size).toBe(0);
  });
});

describe('isStale', () => {
  const storedAt = '2024-09-01T00:00:00.000Z';

  it('compares age with maxAgeMs', () => {
    const now = new Date('2024-09-01T00:00:10.000Z');
    expect(isStale(storedAt, { maxAgeMs: 5000, now })).toBe(true);
    expect(isStale(storedAt, { maxAgeMs: 10000, now })).toBe(false);
  });

  it('never expires without a positive maxAgeMs', () => {
    const now = new Date('2030-01-01T00:00:00.000Z');
    expect(isStale(storedAt, { now })).toBe(false);
    expect(isStale(storedAt, { maxAgeMs: 0, now })).toBe(false);
  });
});
