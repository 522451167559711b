import { describe, it, expect } from 'vitest';
import { ParagraphChunkingStrategy } from '../ParagraphChunkingStrategy.js';

describe('ParagraphChunkingStrategy', () => {
  it('splits on blank lines and drops empty paragraphs', () => {
    const chunker = new ParagraphChunkingStrategy({ maxChars: 20, overlapChars: 5 });
    expect(chunker.splitParagraphs('a\n\n  b \n \n\nc\n\n\n')).toEqual(['a', 'b', 'c']);
  });

  it('packs paragraphs until the next one would exceed maxChars', () => {
    const chunker = new ParagraphChunkingStrategy({ maxChars: 20, overlapChars: 5 });
    const text = ['aaaa', 'b'.repeat(10), 'c'.repeat(10)].join('\n\n');

    expect(chunker.chunk(text)).toEqual([`aaaa\n\n${'b'.repeat(10)}`, 'c'.repeat(10)]);
  });

  it('repeats a short trailing paragraph at the start of the next chunk', () => {
    const chunker = new ParagraphChunkingStrategy({ maxChars: 20, overlapChars: 5 });
    const text = ['b'.repeat(12), 'cc', 'd'.repeat(16)].join('\n\n');

    expect(chunker.chunk(text)).toEqual([`${'b'.repeat(12)}\n\ncc`, `cc\n\n${'d'.repeat(16)}`]);
  });

  it('cuts an oversized paragraph into overlapping windows', () => {
    const chunker = new ParagraphChunkingStrategy({ maxChars: 10, overlapChars: 4 });

    expect(chunker.hardSplit('abcdefghijklmnop')).toEqual(['abcdefghij', 'ghijklmnop']);
    expect(chunker.hardSplit('abcdefghij')).toEqual(['abcdefghij']);
  });

  it('never produces a chunk longer than maxChars', () => {
    const chunker = new ParagraphChunkingStrategy({ maxChars: 50, overlapChars: 10 });
    const paragraphs = Array.from({ length: 30 }, (_, i) => 'word '.repeat((i % 7) * 4 + 1).trim());
    const chunks = chunker.chunk(paragraphs.join('\n\n'));

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.length).toBeLessThanOrEqual(50);
    }
  });

  it('returns no chunks for blank text', () => {
    const chunker = new ParagraphChunkingStrategy({ maxChars: 20, overlapChars: 5 });
    expect(chunker.chunk('')).toEqual([]);
    expect(chunker.chunk(' \n\n \n')).toEqual([]);
  });

  it('rejects an overlap that is not smaller than maxChars', () => {
    expect(() => new ParagraphChunkingStrategy({ maxChars: 10, overlapChars: 10 })).toThrow(RangeError);
    expect(() => new ParagraphChunkingStrategy({ maxChars: 0, overlapChars: 0 })).toThrow(RangeError);
  });
});
