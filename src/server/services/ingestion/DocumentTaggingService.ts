/**
 * Document Tagging Service
 *
 * Assigns sentiment, region, EV relevance and product relevance tags to market documents
 * using keyword lexicons. Matching is case-insensitive on whole words.
 */

import type { DocumentTags, ProductRelevance, Sentiment } from '../../contracts/types.js';

/**
 * Keyword lexicons used for tagging
 */
export interface TaggingLexicons {
  positive: readonly string[];
  negative: readonly string[];
  euMarket: readonly string[];
  electricVehicle: readonly string[];
  component: readonly string[];
}

export const DEFAULT_TAGGING_LEXICONS: TaggingLexicons = {
  positive: ['increase', 'increased', 'increases', 'increasing', 'growth', 'grow', 'grows', 'growing', 'up', 'rise', 'rises', 'rising', 'rose', 'surge', 'surged', 'gain', 'gains', 'higher', 'boost', 'boosted', 'record'],
  negative: ['decrease', 'decreased', 'decline', 'declined', 'declining', 'down', 'drop', 'dropped', 'fall', 'falling', 'fell', 'shortage', 'shortages', 'disruption', 'disruptions', 'slowdown', 'lower', 'weak', 'weaker', 'recall'],
  euMarket: ['EU', 'European Union', 'Europe', 'European', 'Eurozone'],
  electricVehicle: ['EV', 'EVs', 'BEV', 'PHEV', 'electric', 'electric vehicle', 'electric vehicles'],
  component: ['battery', 'batteries', 'inverter', 'inverters', 'cell', 'cells', 'charger', 'chargers', 'motor', 'motors', 'semiconductor', 'semiconductors', 'compressor', 'compressors', 'spark plug', 'spark plugs'],
};

function escapeRegex(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a whole-word, case-insensitive pattern for a lexicon
 */
export function buildLexiconPattern(terms: readonly string[]): RegExp {
  const alternatives = [...terms]
    // Longest first so multi-word phrases win over their prefixes
    .sort((a, b) => b.length - a.length)
    .map(escapeRegex)
    .join('|');
  return new RegExp(`(?<![\\w-])(?:${alternatives})(?![\\w-])`, 'i');
}

/**
 * Service for tagging documents with market metadata
 */
export class DocumentTaggingService {
  private readonly positivePattern: RegExp;
  private readonly negativePattern: RegExp;
  private readonly euPattern: RegExp;
  private readonly evPattern: RegExp;
  private readonly componentPattern: RegExp;

  constructor(lexicons: TaggingLexicons = DEFAULT_TAGGING_LEXICONS) {
    this.positivePattern = buildLexiconPattern(lexicons.positive);
    this.negativePattern = buildLexiconPattern(lexicons.negative);
    this.euPattern = buildLexiconPattern(lexicons.euMarket);
    this.evPattern = buildLexiconPattern(lexicons.electricVehicle);
    this.componentPattern = buildLexiconPattern(lexicons.component);
  }

  tag(content: string): DocumentTags {
    return {
      sentiment: this.detectSentiment(content),
      region: this.euPattern.test(content) ? 'EU' : 'global',
      evRelevance: this.evPattern.test(content),
      productRelevance: this.detectProductRelevance(content),
    };
  }

  /**
   * Negative wins over positive when both lexicons match
   */
  detectSentiment(content: string): Sentiment {
    if (this.negativePattern.test(content)) {
      return 'negative';
    }
    if (this.positivePattern.test(content)) {
      return 'positive';
    }
    return 'neutral';
  }

  detectProductRelevance(content: string): ProductRelevance {
    if (!content.trim()) {
      return 'low';
    }
    return this.componentPattern.test(content) ? 'high' : 'medium';
  }

  /**
   * Whether the text mentions any growth term from the positive lexicon
   */
  mentionsGrowth(text: string): boolean {
    return this.positivePattern.test(text);
  }
}
