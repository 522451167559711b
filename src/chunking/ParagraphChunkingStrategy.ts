import type { ChunkingConfig, ChunkingStrategy } from './ChunkingStrategy.js';

/**
 * Paragraph-first chunking
 *
 * Paragraphs (blank-line separated) are packed into chunks up to maxChars.
 * A new chunk starts with the previous chunk's last paragraph when that
 * paragraph fits in overlapChars. A paragraph longer than maxChars is cut
 * into windows of maxChars stepping by maxChars - overlapChars.
 */
export class ParagraphChunkingStrategy implements ChunkingStrategy {
  constructor(private readonly config: ChunkingConfig) {
    if (!Number.isInteger(config.maxChars) || config.maxChars < 1) {
      throw new RangeError('maxChars must be a positive integer');
    }
    if (config.overlapChars < 0 || config.overlapChars >= config.maxChars) {
      throw new RangeError('overlapChars must be between 0 and maxChars - 1');
    }
  }

  getName(): string {
    return 'paragraph';
  }

  /**
   * Split text into paragraphs, dropping empty ones
   */
  splitParagraphs(text: string): string[] {
    return text
      .split(/\n\s*\n/)
      .map((paragraph) => paragraph.trim())
      .filter((paragraph) => paragraph.length > 0);
  }

  /**
   * Character windows over a paragraph that exceeds the budget
   */
  hardSplit(paragraph: string): string[] {
    const { maxChars, overlapChars } = this.config;
    const step = maxChars - overlapChars;
    const pieces: string[] = [];
    for (let start = 0; start < paragraph.length; start += step) {
      pieces.push(paragraph.slice(start, start + maxChars));
      if (start + maxChars >= paragraph.length) {
        break;
      }
    }
    return pieces;
  }

  chunk(text: string): string[] {
    const { maxChars, overlapChars } = this.config;
    const pieces = this.splitParagraphs(text).flatMap((paragraph) =>
      paragraph.length <= maxChars ? [paragraph] : this.hardSplit(paragraph)
    );

    const chunks: string[] = [];
    let current: string[] = [];
    let currentLength = 0;

    const lengthWith = (piece: string) => (current.length === 0 ? piece.length : currentLength + 2 + piece.length);

    for (const piece of pieces) {
      if (current.length > 0 && lengthWith(piece) > maxChars) {
        chunks.push(current.join('\n\n'));
        const last = current[current.length - 1];
        current = [];
        currentLength = 0;
        if (overlapChars > 0 && last.length <= overlapChars && last.length + 2 + piece.length <= maxChars) {
          current = [last];
          currentLength = last.length;
        }
      }
      currentLength = lengthWith(piece);
      current.push(piece);
    }

    if (current.length > 0) {
      chunks.push(current.join('\n\n'));
    }
    return chunks;
  }
}
