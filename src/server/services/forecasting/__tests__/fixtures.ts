import type { FusedFeatureSet, InsightCandidate, InternalProductData, MarketInsight } from '../../../contracts/types.js';

export const SAMPLE_INTERNAL_DATA: InternalProductData = {
  historicalSales: [100, 120, 115, 130, 125],
  inventoryLevel: 500,
  productionPlans: [150, 160],
};

export function makeCandidate(overrides: Partial<InsightCandidate> = {}): InsightCandidate {
  return {
    documentId: 'doc-1',
    source: 'market-wire',
    content: 'Battery demand rises',
    category: 'market_report',
    publishedAt: new Date('2024-10-01T00:00:00.000Z'),
    tags: { sentiment: 'positive', region: 'EU', evRelevance: true, productRelevance: 'high' },
    relevanceScore: 0.8,
    ...overrides,
  };
}

export function makeInsight(overrides: Partial<MarketInsight> = {}): MarketInsight {
  return {
    productCode: 'BAT-100',
    insightText: 'Market analysis for BAT-100: Battery demand rises',
    keyFindings: ['Battery demand rises'],
    confidence: 0.8,
    sourceDocumentIds: ['doc-1'],
    ...overrides,
  };
}

export function makeFeatures(trend: 'increasing' | 'stable', internalData: InternalProductData = SAMPLE_INTERNAL_DATA): FusedFeatureSet {
  const insight = makeInsight();
  return {
    productCode: 'BAT-100',
    internalData,
    marketInsight: insight,
    derivedFeatures: {
      trend,
      marketSignal: insight.keyFindings,
      inventoryStatus: 'adequate',
    },
  };
}
