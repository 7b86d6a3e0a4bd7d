/**
 * Document Normalization Service
 *
 * Cleans, deduplicates and tags raw market documents before they are indexed.
 *
 * Deduplication: documents with identical (source, content) collapse into one; the copy with
 * the earliest publishedAt is kept, at the position where the pair first appeared.
 *
 * The transform is pure and never throws: missing fields default to empty strings, an
 * unparseable or missing timestamp to the Unix epoch, and empty content to neutral tags.
 */

import type { NormalizedDocument, RawDocument } from '../../contracts/types.js';
import { logger } from '../../utils/logger.js';
import { DocumentTaggingService } from './DocumentTaggingService.js';

/**
 * Raw document as it may arrive from an untyped source
 */
export type RawDocumentInput = {
  [K in keyof RawDocument]?: K extends 'publishedAt' ? Date | string | number | null : RawDocument[K] | null;
};

export interface NormalizationStats {
  totalItems: number;
  cleanedItems: number;
  duplicatesRemoved: number;
}

export interface NormalizationResult {
  documents: NormalizedDocument[];
  stats: NormalizationStats;
}

/**
 * Service for normalizing documents
 */
export class DocumentNormalizationService {
  private readonly taggingService: DocumentTaggingService;

  constructor(taggingService?: DocumentTaggingService) {
    this.taggingService = taggingService || new DocumentTaggingService();
  }

  /**
   * Normalizes, deduplicates and tags a sequence of documents
   */
  normalize(documents: readonly RawDocumentInput[]): NormalizationResult {
    const standardized = documents.map(doc => this.standardizeFields(doc));

    // (source, content) -> index in `kept`
    const seen = new Map<string, number>();
    const kept: RawDocument[] = [];

    for (const doc of standardized) {
      const key = `${doc.source}\u0000${doc.content}`;
      const existingIndex = seen.get(key);

      if (existingIndex === undefined) {
        seen.set(key, kept.length);
        kept.push(doc);
        continue;
      }

      if (doc.publishedAt.getTime() < kept[existingIndex].publishedAt.getTime()) {
        kept[existingIndex] = doc;
      }
    }

    const normalized = kept.map(doc => this.normalizeDocument(doc));
    const duplicatesRemoved = standardized.length - kept.length;

    if (duplicatesRemoved > 0) {
      logger.debug({ duplicatesRemoved, totalItems: documents.length }, 'Removed duplicate market documents');
    }

    return {
      documents: normalized,
      stats: {
        totalItems: documents.length,
        cleanedItems: normalized.length,
        duplicatesRemoved,
      },
    };
  }

  /**
   * Normalizes and tags a single document (no deduplication)
   */
  normalizeDocument(document: RawDocument): NormalizedDocument {
    const cleanedContent = this.cleanContent(document.content);

    return {
      source: document.source,
      content: document.content,
      publishedAt: document.publishedAt,
      category: document.category,
      cleanedContent,
      tags: this.taggingService.tag(document.content),
      normalized: true,
    };
  }

  /**
   * Cleans content for indexing
   *
   * Strategy:
   * - Trim whitespace
   * - Convert to lowercase
   * - Collapse runs of whitespace into single spaces
   */
  cleanContent(content: string): string {
    if (!content) {
      return '';
    }

    return content.trim().toLowerCase().replace(/\s+/g, ' ');
  }

  /**
   * Standardizes document fields
   *
   * Ensures:
   * - Strings are present (empty when missing) and trimmed
   * - publishedAt is a valid Date (epoch when missing or unparseable)
   */
  standardizeFields(document: RawDocumentInput): RawDocument {
    return {
      source: (document.source ?? '').trim(),
      content: (document.content ?? '').trim(),
      publishedAt: this.parseDate(document.publishedAt),
      category: (document.category ?? '').trim(),
    };
  }

  private parseDate(value: Date | string | number | null | undefined): Date {
    if (value === null || value === undefined || value === '') {
      return new Date(0);
    }

    const date = value instanceof Date ? new Date(value.getTime()) : new Date(value);
    if (isNaN(date.getTime())) {
      logger.debug({ publishedAt: value }, 'Unparseable publishedAt, defaulting to epoch');
      return new Date(0);
    }
    return date;
  }
}
