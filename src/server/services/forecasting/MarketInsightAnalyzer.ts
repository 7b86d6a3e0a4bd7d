/**
 * Market Insight Analyzer
 *
 * Summarizes the top retrieved documents for a product into a MarketInsight: a short
 * insight text, up to three key-finding phrases and a confidence equal to the mean
 * relevance of the documents used.
 */

import type { InsightCandidate, MarketInsight } from '../../contracts/types.js';
import { clamp, mean, roundTo } from '../../utils/numberUtils.js';

const MAX_KEY_FINDINGS = 3;
const INSIGHT_SUMMARY_LENGTH = 100;

export interface MarketInsightAnalyzerOptions {
  /** Candidates summarized, taken from the top of the ranking */
  maxInsights: number;
  /** Confidence when no candidate was retrieved */
  defaultConfidence: number;
}

/**
 * First clause of a document: text up to the first sentence break or spaced dash,
 * without trailing punctuation
 */
export function extractKeyFinding(content: string): string {
  const [firstClause = ''] = content.trim().split(/(?<=[.!?;])\s+|\s+[-–]\s+/);
  return firstClause.replace(/[.!?;:,]+$/, '').trim();
}

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength).trimEnd()}...`;
}

export class MarketInsightAnalyzer {
  constructor(private readonly options: MarketInsightAnalyzerOptions) {}

  analyze(productCode: string, candidates: readonly InsightCandidate[]): MarketInsight {
    const used = candidates.slice(0, this.options.maxInsights);

    if (used.length === 0) {
      return {
        productCode,
        insightText: `No external market signals found for ${productCode}`,
        keyFindings: [],
        confidence: this.options.defaultConfidence,
        sourceDocumentIds: [],
      };
    }

    const summary = used.map(candidate => candidate.content.trim()).join(' ');

    return {
      productCode,
      insightText: `Market analysis for ${productCode}: ${truncate(summary, INSIGHT_SUMMARY_LENGTH)}`,
      keyFindings: this.deriveKeyFindings(used),
      confidence: roundTo(clamp(mean(used.map(candidate => candidate.relevanceScore)), 0, 1), 4),
      sourceDocumentIds: used.map(candidate => candidate.documentId),
    };
  }

  /**
   * One phrase per candidate, case-insensitively unique, at most three
   */
  private deriveKeyFindings(candidates: readonly InsightCandidate[]): string[] {
    const findings: string[] = [];
    const seen = new Set<string>();

    for (const candidate of candidates) {
      const finding = extractKeyFinding(candidate.content);
      const key = finding.toLowerCase();
      if (!finding || seen.has(key)) {
        continue;
      }
      seen.add(key);
      findings.push(finding);
      if (findings.length === MAX_KEY_FINDINGS) {
        break;
      }
    }
    return findings;
  }
}
