/**
 * Embedding provider interface.
 * Turns text into fixed-length vectors for the policy store.
 */

export interface IEmbeddingProvider {
  /** Vector length produced by this provider. */
  readonly dimensions: number;

  generate(text: string): Promise<number[]>;

  /** Embeddings in the same order as `texts`. */
  generateBatch(texts: string[]): Promise<number[][]>;
}
