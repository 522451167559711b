/**
 * EmbeddingProvider - Interface for embedding generation providers
 */
export interface EmbeddingProvider {
  /**
   * Generate embeddings for multiple texts (batched), one vector per text, in order
   */
  generateEmbeddings(texts: string[]): Promise<number[][]>;

  /**
   * Model identifier recorded alongside stored vectors
   */
  getName(): string;

  getDims(): number;
}
