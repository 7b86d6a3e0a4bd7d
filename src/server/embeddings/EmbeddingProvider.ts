/**
 * EmbeddingProvider - Interface for embedding generation providers
 *
 * Abstraction over embedding backends so the document index can move from the built-in
 * hashing embeddings to a hosted or local model without changing its callers.
 */

/**
 * EmbeddingProvider interface
 */
export interface EmbeddingProvider {
  /**
   * Generate embedding for text
   *
   * @param text - Text to embed
   * @returns Embedding vector
   */
  generateEmbedding(text: string): Promise<number[]>;

  /**
   * Generate embeddings for multiple texts (batched)
   *
   * @param texts - Array of texts to embed
   * @returns Array of embedding vectors
   */
  generateEmbeddings(texts: string[]): Promise<number[][]>;

  /**
   * Get provider name
   */
  getName(): string;

  /**
   * Get model dimensions
   */
  getDims(): number;
}

/**
 * Cosine similarity of two vectors of equal length; 0 when either is all zeros
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
