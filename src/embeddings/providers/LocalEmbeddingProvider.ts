/**
 * LocalEmbeddingProvider - in-process sentence embeddings via @huggingface/transformers
 *
 * The model is downloaded and loaded on first use; concurrent callers share
 * the same load.
 */

import type { FeatureExtractionPipeline } from '@huggingface/transformers';
import type { EmbeddingProvider } from '../EmbeddingProvider.js';
import { logger } from '../../utils/logger.js';

/**
 * Split a flat (rows x dims) tensor into rows
 */
export function tensorToRows(output: unknown, rows: number, dims: number): number[][] {
  if (!output || typeof output !== 'object' || !('data' in output)) {
    throw new Error('Embedding pipeline returned no tensor data');
  }
  const data = output.data;
  if (!(data instanceof Float32Array) && !(data instanceof Float64Array)) {
    throw new Error('Embedding pipeline returned an unexpected tensor type');
  }
  if (data.length !== rows * dims) {
    throw new Error(`Embedding tensor has ${data.length} values, expected ${rows} x ${dims}`);
  }

  const result: number[][] = [];
  for (let row = 0; row < rows; row++) {
    result.push(Array.from(data.subarray(row * dims, (row + 1) * dims)));
  }
  return result;
}

export class LocalEmbeddingProvider implements EmbeddingProvider {
  private pipe: FeatureExtractionPipeline | null = null;
  private loading: Promise<FeatureExtractionPipeline> | null = null;

  constructor(
    private readonly modelName: string,
    private readonly dims: number
  ) {}

  private async init(): Promise<FeatureExtractionPipeline> {
    if (this.pipe) {
      return this.pipe;
    }
    if (!this.loading) {
      this.loading = (async () => {
        logger.info({ model: this.modelName }, 'Loading embedding model');
        const { pipeline } = await import('@huggingface/transformers');
        const loaded = await pipeline('feature-extraction', this.modelName);
        logger.info({ model: this.modelName }, 'Embedding model loaded');
        return loaded;
      })();
      this.loading.catch(() => {
        this.loading = null;
      });
    }
    this.pipe = await this.loading;
    return this.pipe;
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const pipe = await this.init();
    const output = await pipe(texts, { pooling: 'mean', normalize: true });
    return tensorToRows(output, texts.length, this.dims);
  }

  getName(): string {
    return this.modelName;
  }

  getDims(): number {
    return this.dims;
  }
}
