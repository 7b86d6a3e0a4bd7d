/**
 * Feature Fusion Service
 *
 * Joins a product's market insight with its internal sales, inventory and production data
 * and derives the features the forecast model consumes.
 */

import type { FusedFeatureSet, InternalProductData, MarketInsight } from '../../contracts/types.js';
import { DocumentTaggingService } from '../ingestion/DocumentTaggingService.js';

export interface FeatureFusionOptions {
  /** Inventory strictly above this level is `adequate`, otherwise `low` */
  inventoryFloor: number;
}

export class FeatureFusionService {
  private readonly taggingService: DocumentTaggingService;

  constructor(
    private readonly options: FeatureFusionOptions,
    taggingService?: DocumentTaggingService
  ) {
    this.taggingService = taggingService || new DocumentTaggingService();
  }

  fuse(insight: MarketInsight, internalData: InternalProductData): FusedFeatureSet {
    const growthSignalled = insight.keyFindings.some(finding => this.taggingService.mentionsGrowth(finding));

    return {
      productCode: insight.productCode,
      internalData,
      marketInsight: insight,
      derivedFeatures: {
        trend: growthSignalled ? 'increasing' : 'stable',
        marketSignal: insight.keyFindings,
        inventoryStatus: internalData.inventoryLevel > this.options.inventoryFloor ? 'adequate' : 'low',
      },
    };
  }
}
