export * from './contracts/types.js';
export * from './types/errors.js';
export * from './types/progress.js';
export {
  DEFAULT_PIPELINE_CONFIG,
  getPipelineConfigFromEnv,
  resolvePipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput,
  type RetryPolicy,
} from './config/pipelineConfig.js';

export { StaticSignalSource } from './services/ingestion/StaticSignalSource.js';
export { DocumentNormalizationService } from './services/ingestion/DocumentNormalizationService.js';
export { DocumentTaggingService, DEFAULT_TAGGING_LEXICONS } from './services/ingestion/DocumentTaggingService.js';
export { InMemoryDocumentIndex } from './vector/InMemoryDocumentIndex.js';
export type { EmbeddingProvider } from './embeddings/EmbeddingProvider.js';
export { HashingEmbeddingProvider } from './embeddings/providers/HashingEmbeddingProvider.js';

export { planBatches } from './services/forecasting/BatchPlanner.js';
export { ProductForecaster } from './services/forecasting/ProductForecaster.js';
export { MarketInsightAnalyzer } from './services/forecasting/MarketInsightAnalyzer.js';
export { FeatureFusionService } from './services/forecasting/FeatureFusionService.js';
export { BaselineForecastModel, nextQuarterLabel, type ForecastModel } from './services/forecasting/DemandForecastModel.js';
export { aggregateForecasts } from './services/forecasting/ForecastAggregator.js';
export { AlertEvaluator, computeChangePercent } from './services/alerts/AlertEvaluator.js';

export { InMemoryInternalDataProvider } from './services/internal/InMemoryInternalDataProvider.js';
export { InMemoryPriorForecastProvider } from './services/internal/InMemoryPriorForecastProvider.js';

export {
  ForecastPipelineRunner,
  runPipeline,
  type PipelineDependencies,
  type RunPipelineOptions,
} from './services/pipeline/ForecastPipelineRunner.js';
export { RunReportWriter, loadRunReport } from './services/pipeline/RunReportWriter.js';
