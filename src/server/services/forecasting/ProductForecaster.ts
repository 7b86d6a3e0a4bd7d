/**
 * Product Forecaster
 *
 * Runs the per-product sub-pipeline inside a batch worker:
 *
 *   1. Retrieve  - top-N documents for the product from the document index
 *   2. Analyze   - summarize them into a MarketInsight
 *   3. Fuse      - join the insight with internal sales/inventory/production data
 *   4. Forecast  - produce a ProductForecast from the fused features
 *
 * Each step starts only after its predecessor's output is available. Index outages and
 * timeouts are retried with backoff; once retries are exhausted the error propagates so
 * the caller can record a per-product failure.
 */

import type { Logger } from 'pino';
import type {
  DocumentIndex,
  FusedFeatureSet,
  InsightCandidate,
  InternalDataProvider,
  MarketInsight,
  ProductForecast,
} from '../../contracts/types.js';
import type { RetryPolicy } from '../../config/pipelineConfig.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { withTimeout } from '../../utils/withTimeout.js';
import { assertValidForecast, type ForecastModel } from './DemandForecastModel.js';
import type { FeatureFusionService } from './FeatureFusionService.js';
import type { MarketInsightAnalyzer } from './MarketInsightAnalyzer.js';

export interface ProductForecasterDependencies {
  documentIndex: DocumentIndex;
  internalData: InternalDataProvider;
  analyzer: MarketInsightAnalyzer;
  fusion: FeatureFusionService;
  model: ForecastModel;
}

export interface ProductForecasterOptions {
  insightTopN: number;
  queryTimeoutMs: number;
  periodLengthDays: number;
  retry: RetryPolicy;
}

export interface ForecastRunContext {
  period: string;
  generatedAt: Date;
  logger?: Logger;
}

export class ProductForecaster {
  constructor(
    private readonly deps: ProductForecasterDependencies,
    private readonly options: ProductForecasterOptions
  ) {}

  async forecastProduct(productCode: string, context: ForecastRunContext): Promise<ProductForecast> {
    const log = context.logger || defaultLogger;

    const candidates = await this.retrieve(productCode, log);
    const insight = this.analyze(productCode, candidates);
    const features = await this.fuse(insight, log);
    const forecast = this.forecast(features, context);

    log.debug(
      {
        productCode,
        insights: candidates.length,
        trend: features.derivedFeatures.trend,
        forecastUnits: forecast.forecastUnits,
      },
      'Product forecast generated'
    );
    return forecast;
  }

  async retrieve(productCode: string, log: Logger = defaultLogger): Promise<InsightCandidate[]> {
    const { insightTopN, queryTimeoutMs } = this.options;

    return retryWithBackoff(
      () => withTimeout(
        this.deps.documentIndex.queryTopN(productCode, insightTopN, { timeoutMs: queryTimeoutMs }),
        queryTimeoutMs,
        `queryTopN(${productCode})`
      ),
      { ...this.options.retry, logger: log },
      `retrieve ${productCode}`
    );
  }

  analyze(productCode: string, candidates: readonly InsightCandidate[]): MarketInsight {
    return this.deps.analyzer.analyze(productCode, candidates);
  }

  async fuse(insight: MarketInsight, log: Logger = defaultLogger): Promise<FusedFeatureSet> {
    const { queryTimeoutMs } = this.options;
    const productCode = insight.productCode;

    const internalData = await retryWithBackoff(
      () => withTimeout(
        this.deps.internalData.getHistory(productCode, { timeoutMs: queryTimeoutMs }),
        queryTimeoutMs,
        `getHistory(${productCode})`
      ),
      { ...this.options.retry, logger: log },
      `fuse ${productCode}`
    );

    return this.deps.fusion.fuse(insight, internalData);
  }

  forecast(features: FusedFeatureSet, context: ForecastRunContext): ProductForecast {
    const forecast = this.deps.model.predict(features, {
      period: context.period,
      periodLengthDays: this.options.periodLengthDays,
      generatedAt: context.generatedAt,
    });
    assertValidForecast(forecast);
    return forecast;
  }
}
