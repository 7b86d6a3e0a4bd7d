/**
 * InMemoryDocumentIndex - in-process implementation of DocumentIndex
 *
 * Embeds each document's cleaned content through an EmbeddingProvider and ranks documents
 * for a product by blending cosine similarity with the document's product-relevance tag.
 *
 * Document IDs are content hashes of (source, content), so storing the same document twice
 * updates the existing entry instead of adding a new one. Reads never mutate state, which
 * makes concurrent queryTopN calls from several batch workers safe.
 */

import type {
  CallOptions,
  DocumentIndex,
  IndexedDocumentRef,
  InsightCandidate,
  NormalizedDocument,
  ProductRelevance,
} from '../contracts/types.js';
import type { EmbeddingProvider } from '../embeddings/EmbeddingProvider.js';
import { cosineSimilarity } from '../embeddings/EmbeddingProvider.js';
import { HashingEmbeddingProvider } from '../embeddings/providers/HashingEmbeddingProvider.js';
import { IndexUnavailableError, RunCancelledError } from '../types/errors.js';
import { computeDocumentId } from '../utils/contentHash.js';
import { logger } from '../utils/logger.js';
import { clamp, roundTo } from '../utils/numberUtils.js';

/**
 * Scoring weights; they should sum to 1 so scores stay in [0, 1]
 */
export interface RelevanceWeights {
  semantic: number;
  productRelevance: number;
}

export interface InMemoryDocumentIndexOptions {
  embeddingProvider?: EmbeddingProvider;
  weights?: RelevanceWeights;
}

interface IndexEntry {
  documentId: string;
  embeddingHandle: string;
  document: NormalizedDocument;
  embedding: number[];
}

const DEFAULT_WEIGHTS: RelevanceWeights = {
  semantic: 0.7,
  productRelevance: 0.3,
};

const PRODUCT_RELEVANCE_BOOST: Record<ProductRelevance, number> = {
  high: 1,
  medium: 0.5,
  low: 0,
};

export class InMemoryDocumentIndex implements DocumentIndex {
  private readonly embeddingProvider: EmbeddingProvider;
  private readonly weights: RelevanceWeights;
  private readonly entries = new Map<string, IndexEntry>();
  private available = true;

  constructor(options: InMemoryDocumentIndexOptions = {}) {
    this.embeddingProvider = options.embeddingProvider || new HashingEmbeddingProvider();
    this.weights = options.weights || DEFAULT_WEIGHTS;
  }

  async store(documents: readonly NormalizedDocument[], options: CallOptions = {}): Promise<IndexedDocumentRef[]> {
    this.ensureAvailable('store', options);

    const embeddings = await this.embeddingProvider.generateEmbeddings(documents.map(doc => doc.cleanedContent));
    const refs: IndexedDocumentRef[] = [];

    documents.forEach((document, i) => {
      const documentId = computeDocumentId(document.source, document.content);
      const embeddingHandle = `${this.embeddingProvider.getName()}:${this.embeddingProvider.getDims()}:${documentId}`;

      this.entries.set(documentId, {
        documentId,
        embeddingHandle,
        document,
        embedding: embeddings[i],
      });
      refs.push({ documentId, embeddingHandle });
    });

    logger.debug({ stored: refs.length, indexSize: this.entries.size }, 'Stored documents in index');
    return refs;
  }

  async queryTopN(productCode: string, n: number, options: CallOptions = {}): Promise<InsightCandidate[]> {
    this.ensureAvailable('queryTopN', options);

    if (n <= 0 || this.entries.size === 0) {
      return [];
    }

    const queryEmbedding = await this.embeddingProvider.generateEmbedding(productCode);

    const candidates: InsightCandidate[] = [];
    for (const entry of this.entries.values()) {
      const similarity = Math.max(0, cosineSimilarity(queryEmbedding, entry.embedding));
      const boost = PRODUCT_RELEVANCE_BOOST[entry.document.tags.productRelevance];
      const score = clamp(this.weights.semantic * similarity + this.weights.productRelevance * boost, 0, 1);

      candidates.push({
        documentId: entry.documentId,
        source: entry.document.source,
        content: entry.document.content,
        category: entry.document.category,
        publishedAt: entry.document.publishedAt,
        tags: entry.document.tags,
        relevanceScore: score,
      });
    }

    return candidates
      .sort(compareCandidates)
      .slice(0, n)
      .map(candidate => ({ ...candidate, relevanceScore: roundTo(candidate.relevanceScore, 4) }));
  }

  /**
   * Number of distinct documents held
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Simulate an outage of the backing store
   */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  private ensureAvailable(operation: string, options: CallOptions): void {
    if (!this.available) {
      throw new IndexUnavailableError(`${operation} failed: index offline`);
    }
    if (options.signal?.aborted) {
      throw new RunCancelledError(`DocumentIndex.${operation}`);
    }
  }
}

/**
 * Descending relevance, then most recent publishedAt, then document ID
 */
export function compareCandidates(a: InsightCandidate, b: InsightCandidate): number {
  if (b.relevanceScore !== a.relevanceScore) {
    return b.relevanceScore - a.relevanceScore;
  }
  const byRecency = b.publishedAt.getTime() - a.publishedAt.getTime();
  if (byRecency !== 0) {
    return byRecency;
  }
  return a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0;
}
