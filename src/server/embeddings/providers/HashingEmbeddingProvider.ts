/**
 * HashingEmbeddingProvider - deterministic bag-of-words embeddings
 *
 * Tokens are lowercased, reduced to a crude singular form and hashed (FNV-1a) into a fixed
 * number of buckets; the resulting count vector is L2-normalized. No model download and no
 * network access, so the same text always yields the same vector.
 */

import type { EmbeddingProvider } from '../EmbeddingProvider.js';

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const STOP_WORDS = new Set(['a', 'an', 'and', 'the', 'of', 'in', 'on', 'for', 'to', 'by', 'due', 'with', 'is', 'are', 'at', 'from']);

function fnv1a(token: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Split text into normalized tokens ("Batteries-48V" -> ["battery", "48v"])
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(token => token.length > 1 && !STOP_WORDS.has(token))
    .map(singularize);
}

function singularize(token: string): string {
  if (token.length > 4 && token.endsWith('ies')) {
    return `${token.slice(0, -3)}y`;
  }
  if (token.length > 3 && token.endsWith('s') && !token.endsWith('ss')) {
    return token.slice(0, -1);
  }
  return token;
}

export class HashingEmbeddingProvider implements EmbeddingProvider {
  private readonly dims: number;

  constructor(dims: number = 256) {
    if (!Number.isInteger(dims) || dims < 1) {
      throw new Error(`Invalid embedding dimensions: ${dims}`);
    }
    this.dims = dims;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    return this.embed(text);
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.embed(text));
  }

  getName(): string {
    return 'hashing';
  }

  getDims(): number {
    return this.dims;
  }

  private embed(text: string): number[] {
    const vector = new Array<number>(this.dims).fill(0);
    for (const token of tokenize(text)) {
      vector[fnv1a(token) % this.dims] += 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map(value => value / norm);
  }
}
