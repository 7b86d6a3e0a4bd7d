/**
 * Forecast Pipeline Runner
 *
 * Orchestrates one forecasting run through a fixed sequence of stages:
 *
 *   INGESTING -> NORMALIZING -> INDEXING -> PLANNING -> FORECASTING -> AGGREGATING -> ALERTING -> DONE
 *
 * FORECASTING fans out one worker per product batch (at most `batchCount` in flight) and
 * joins them all before AGGREGATING. Within a batch, products run one after another.
 *
 * Failure policy:
 * - ConfigInvalid is raised before any stage runs.
 * - A stage-level failure (source unavailable, index unavailable after retries during
 *   INDEXING) ends the run with status `failed`; diagnostics keep the partial state.
 * - A per-product failure during FORECASTING omits that product and is listed in
 *   `failures`; sibling products and batches continue.
 * - A batch worker that throws anything else contributes an empty batch; every product in
 *   it is listed with code BATCH_WORKER_FAILED.
 *
 * Cancellation: when `signal` aborts, workers finish the product in hand, start no new
 * ones, and the remaining products are reported in `skippedProducts` with `incomplete: true`.
 * Cancelled before FORECASTING, the run goes straight to AGGREGATING with every product
 * skipped. Cancellation is never a stage failure.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import type {
  DocumentIndex,
  ExternalSignalSource,
  IndexedDocumentRef,
  InternalDataProvider,
  NormalizedDocument,
  PipelineDiagnostics,
  PipelineRunResult,
  PipelineStatus,
  PriorForecastProvider,
  ProductBatch,
  ProductFailure,
  ProductForecast,
  RawDocument,
} from '../../contracts/types.js';
import { resolvePipelineConfig, type PipelineConfig, type PipelineConfigInput } from '../../config/pipelineConfig.js';
import {
  ConfigInvalidError,
  ErrorCode,
  RunCancelledError,
  SourceUnavailableError,
  getErrorMessage,
  isPerProductFailure,
  toAppError,
} from '../../types/errors.js';
import type { PipelineProgressListener, PipelineStage } from '../../types/progress.js';
import { settleWithConcurrency } from '../../utils/concurrency.js';
import { createChildLogger, withRunContext } from '../../utils/logger.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { withTimeout } from '../../utils/withTimeout.js';
import { formatIssues, productCodesSchema } from '../../validation/pipelineSchemas.js';
import { AlertEvaluator, summarizeAlerts } from '../alerts/AlertEvaluator.js';
import { BaselineForecastModel, nextQuarterLabel, type ForecastModel } from '../forecasting/DemandForecastModel.js';
import { planBatches } from '../forecasting/BatchPlanner.js';
import { FeatureFusionService } from '../forecasting/FeatureFusionService.js';
import { EMPTY_FORECAST_SET, aggregateForecasts } from '../forecasting/ForecastAggregator.js';
import { MarketInsightAnalyzer } from '../forecasting/MarketInsightAnalyzer.js';
import { ProductForecaster } from '../forecasting/ProductForecaster.js';
import { DocumentNormalizationService } from '../ingestion/DocumentNormalizationService.js';
import { DocumentTaggingService } from '../ingestion/DocumentTaggingService.js';
import { InMemoryPriorForecastProvider } from '../internal/InMemoryPriorForecastProvider.js';
import { PipelineStageTracker } from './PipelineStageTracker.js';

/**
 * External collaborators of a run
 */
export interface PipelineDependencies {
  signalSource: ExternalSignalSource;
  documentIndex: DocumentIndex;
  internalData: InternalDataProvider;
  /** Defaults to an empty provider, so every product uses the synthetic baseline */
  priorForecasts?: PriorForecastProvider;
  /** Defaults to {@link BaselineForecastModel} with the run's market factors */
  forecastModel?: ForecastModel;
  taggingService?: DocumentTaggingService;
}

export interface RunPipelineOptions {
  /** Run-scoped cancellation signal */
  signal?: AbortSignal;
  onProgress?: PipelineProgressListener;
  runId?: string;
  /** Clock used for generatedAt, stage timings and the forecast period */
  now?: () => Date;
}

interface BatchOutcome {
  forecasts: ProductForecast[];
  failures: ProductFailure[];
  skipped: string[];
}

interface ForecastingOutcome {
  batchForecasts: ProductForecast[][];
  failures: ProductFailure[];
  skipped: string[];
}

interface MutableDiagnostics {
  documentsIngested: number;
  documentsNormalized: number;
  duplicatesRemoved: number;
  documentsIndexed: number;
  batchCount: number;
}

interface RunContext {
  runId: string;
  config: PipelineConfig;
  generatedAt: Date;
  period: string;
  signal?: AbortSignal;
  tracker: PipelineStageTracker;
  log: Logger;
}

/**
 * Trim codes, reject empty ones and drop repeats (first occurrence wins)
 *
 * @throws {ConfigInvalidError} when any code is not a non-empty string
 */
export function normalizeProductCodes(productCodes: readonly unknown[]): string[] {
  const parsed = productCodesSchema.safeParse(productCodes);
  if (!parsed.success) {
    throw new ConfigInvalidError(formatIssues(parsed.error, 'productCodes'));
  }
  return [...new Set(parsed.data)];
}

export class ForecastPipelineRunner {
  private readonly taggingService: DocumentTaggingService;
  private readonly normalizer: DocumentNormalizationService;
  private readonly priorForecasts: PriorForecastProvider;

  constructor(private readonly deps: PipelineDependencies) {
    this.taggingService = deps.taggingService || new DocumentTaggingService();
    this.normalizer = new DocumentNormalizationService(this.taggingService);
    this.priorForecasts = deps.priorForecasts || new InMemoryPriorForecastProvider();
  }

  /**
   * Execute one pipeline run to completion
   *
   * @throws {ConfigInvalidError} before any stage runs, for invalid config or product codes
   */
  async run(
    productCodes: readonly string[],
    configInput: PipelineConfigInput = {},
    options: RunPipelineOptions = {}
  ): Promise<PipelineRunResult> {
    const config = resolvePipelineConfig(configInput);
    const codes = normalizeProductCodes(productCodes);

    const runId = options.runId || randomUUID();
    const now = options.now || (() => new Date());
    const generatedAt = now();

    return withRunContext({ runId }, async () => {
      const log = createChildLogger({ component: 'ForecastPipelineRunner' });
      if (codes.length !== productCodes.length) {
        log.warn({ received: productCodes.length, unique: codes.length }, 'Collapsed repeated product codes');
      }

      const ctx: RunContext = {
        runId,
        config,
        generatedAt,
        period: nextQuarterLabel(generatedAt),
        signal: options.signal,
        tracker: new PipelineStageTracker(runId, log, options.onProgress, now),
        log,
      };
      return this.execute(codes, ctx);
    });
  }

  private async execute(codes: string[], ctx: RunContext): Promise<PipelineRunResult> {
    const { config, tracker, log } = ctx;
    const diagnostics: MutableDiagnostics = {
      documentsIngested: 0,
      documentsNormalized: 0,
      duplicatesRemoved: 0,
      documentsIndexed: 0,
      batchCount: 0,
    };

    log.info({ products: codes.length, batchCount: config.batchCount }, 'Forecast pipeline run started');

    try {
      const batches = await this.prepare(codes, ctx, diagnostics);

      let outcome: ForecastingOutcome;
      if (batches) {
        tracker.begin('FORECASTING');
        outcome = await this.forecastBatches(batches, ctx);
        tracker.complete();
      } else {
        outcome = { batchForecasts: [], failures: [], skipped: [...codes] };
      }

      tracker.begin('AGGREGATING');
      const aggregatedForecasts = aggregateForecasts(outcome.batchForecasts);
      tracker.complete();

      tracker.begin('ALERTING');
      const alertEvaluator = new AlertEvaluator(this.priorForecasts, {
        alertThresholdPercent: config.alertThresholdPercent,
        highSeverityThresholdPercent: config.highSeverityThresholdPercent,
        timeoutMs: config.queryTimeoutMs,
      });
      const { alerts, alertSummary } = await alertEvaluator.evaluate(aggregatedForecasts.forecasts, log);
      tracker.complete();

      tracker.begin('DONE');
      tracker.complete();

      const incomplete = outcome.skipped.length > 0;
      const status: PipelineStatus =
        outcome.failures.length > 0 || incomplete ? 'completedWithOmissions' : 'completed';

      log.info(
        {
          status,
          forecasts: aggregatedForecasts.totalProducts,
          failed: outcome.failures.length,
          skipped: outcome.skipped.length,
          alerts: alertSummary.total,
        },
        'Forecast pipeline run finished'
      );

      return {
        runId: ctx.runId,
        status,
        incomplete,
        aggregatedForecasts,
        alerts,
        alertSummary,
        failures: outcome.failures,
        skippedProducts: outcome.skipped,
        diagnostics: this.snapshotDiagnostics(diagnostics, tracker),
        generatedAt: ctx.generatedAt,
      };
    } catch (error) {
      const appError = toAppError(error);
      const stage = tracker.current || 'INGESTING';
      tracker.fail(appError.message);

      log.error({ stage, code: appError.code, error: appError.message, stack: appError.stack }, 'Forecast pipeline run failed');

      return {
        runId: ctx.runId,
        status: 'failed',
        incomplete: false,
        aggregatedForecasts: EMPTY_FORECAST_SET,
        alerts: [],
        alertSummary: summarizeAlerts([]),
        failures: [],
        skippedProducts: [],
        error: { stage, code: appError.code, message: appError.message },
        diagnostics: this.snapshotDiagnostics(diagnostics, tracker),
        generatedAt: ctx.generatedAt,
      };
    }
  }

  /**
   * INGESTING through PLANNING. Resolves to undefined when the run is cancelled before
   * FORECASTING; the open stage is closed as cancelled and every product is skipped.
   */
  private async prepare(
    codes: string[],
    ctx: RunContext,
    diagnostics: MutableDiagnostics
  ): Promise<ProductBatch[] | undefined> {
    const { config, tracker, log } = ctx;

    try {
      this.throwIfCancelled(ctx, 'INGESTING');
      tracker.begin('INGESTING');
      const rawDocuments = await this.ingest(ctx);
      diagnostics.documentsIngested = rawDocuments.length;
      tracker.complete();

      this.throwIfCancelled(ctx, 'NORMALIZING');
      tracker.begin('NORMALIZING');
      const { documents, stats } = this.normalizer.normalize(rawDocuments);
      diagnostics.documentsNormalized = stats.cleanedItems;
      diagnostics.duplicatesRemoved = stats.duplicatesRemoved;
      tracker.complete();

      this.throwIfCancelled(ctx, 'INDEXING');
      tracker.begin('INDEXING');
      const refs = await this.index(documents, ctx);
      diagnostics.documentsIndexed = refs.length;
      tracker.complete();

      this.throwIfCancelled(ctx, 'PLANNING');
      tracker.begin('PLANNING');
      const batches = planBatches(codes, config.batchCount);
      diagnostics.batchCount = batches.length;
      tracker.complete();

      return batches;
    } catch (error) {
      if (!(error instanceof RunCancelledError) && !ctx.signal?.aborted) {
        throw error;
      }
      tracker.cancel();
      log.info({ stage: tracker.current, skipped: codes.length }, 'Run cancelled before forecasting, skipping all products');
      return undefined;
    }
  }

  private throwIfCancelled(ctx: RunContext, stage: PipelineStage): void {
    if (ctx.signal?.aborted) {
      throw new RunCancelledError(stage);
    }
  }

  /**
   * INGESTING: any failure to fetch, including a timeout, is a SourceUnavailable
   */
  private async ingest(ctx: RunContext): Promise<RawDocument[]> {
    const { signalSource } = this.deps;
    const timeoutMs = ctx.config.fetchTimeoutMs;

    try {
      return await withTimeout(
        signalSource.fetch({ timeoutMs, signal: ctx.signal }),
        timeoutMs,
        `${signalSource.name}.fetch`
      );
    } catch (error) {
      if (error instanceof SourceUnavailableError || error instanceof RunCancelledError) {
        throw error;
      }
      throw new SourceUnavailableError(signalSource.name, getErrorMessage(error), { cause: error });
    }
  }

  /**
   * INDEXING: retried on index outages and timeouts; exhausting retries fails the run
   */
  private async index(documents: NormalizedDocument[], ctx: RunContext): Promise<IndexedDocumentRef[]> {
    const timeoutMs = ctx.config.queryTimeoutMs;

    return retryWithBackoff(
      () => withTimeout(this.deps.documentIndex.store(documents, { timeoutMs, signal: ctx.signal }), timeoutMs, 'DocumentIndex.store'),
      { ...ctx.config.retry, signal: ctx.signal, logger: ctx.log },
      'index documents'
    );
  }

  /**
   * FORECASTING: fan out one worker per batch and wait for all of them (join barrier)
   */
  private async forecastBatches(batches: ProductBatch[], ctx: RunContext): Promise<ForecastingOutcome> {
    const { config } = ctx;
    const forecaster = new ProductForecaster(
      {
        documentIndex: this.deps.documentIndex,
        internalData: this.deps.internalData,
        analyzer: new MarketInsightAnalyzer({
          maxInsights: config.maxInsights,
          defaultConfidence: config.defaultInsightConfidence,
        }),
        fusion: new FeatureFusionService({ inventoryFloor: config.inventoryFloor }, this.taggingService),
        model: this.deps.forecastModel || new BaselineForecastModel({
          defaultMarketFactor: config.defaultMarketFactor,
          growthMarketFactor: config.growthMarketFactor,
        }),
      },
      {
        insightTopN: config.insightTopN,
        queryTimeoutMs: config.queryTimeoutMs,
        periodLengthDays: config.periodLengthDays,
        retry: config.retry,
      }
    );

    const settled = await settleWithConcurrency(batches, config.batchCount, (batch, batchIndex) =>
      this.runBatchWorker(batch, batchIndex, forecaster, ctx)
    );

    const outcome: ForecastingOutcome = { batchForecasts: [], failures: [], skipped: [] };

    settled.forEach((result, batchIndex) => {
      const batch = batches[batchIndex];
      let batchOutcome: BatchOutcome;

      if (result.status === 'fulfilled') {
        batchOutcome = result.value;
      } else {
        const reason = getErrorMessage(result.reason);
        ctx.log.error({ batchIndex, error: reason }, 'Batch worker failed, dropping its results');
        batchOutcome = {
          forecasts: [],
          failures: batch.map(productCode => ({
            productCode,
            batchIndex,
            code: ErrorCode.BATCH_WORKER_FAILED,
            reason,
          })),
          skipped: [],
        };
      }

      outcome.batchForecasts.push(batchOutcome.forecasts);
      outcome.failures.push(...batchOutcome.failures);
      outcome.skipped.push(...batchOutcome.skipped);

      ctx.tracker.emit({
        type: 'batch_completed',
        batchIndex,
        forecastsProduced: batchOutcome.forecasts.length,
        productsFailed: batchOutcome.failures.length,
        productsSkipped: batchOutcome.skipped.length,
      });
    });

    return outcome;
  }

  private async runBatchWorker(
    batch: ProductBatch,
    batchIndex: number,
    forecaster: ProductForecaster,
    ctx: RunContext
  ): Promise<BatchOutcome> {
    return withRunContext({ batchIndex }, async () => {
      const log = createChildLogger({ component: 'BatchWorker' });
      const outcome: BatchOutcome = { forecasts: [], failures: [], skipped: [] };

      for (let i = 0; i < batch.length; i++) {
        const productCode = batch[i];

        if (ctx.signal?.aborted) {
          outcome.skipped.push(...batch.slice(i));
          log.info({ skipped: batch.length - i }, 'Run cancelled, batch worker stopping');
          break;
        }

        try {
          const forecast = await forecaster.forecastProduct(productCode, {
            period: ctx.period,
            generatedAt: ctx.generatedAt,
            logger: log,
          });
          outcome.forecasts.push(forecast);
        } catch (error) {
          if (!isPerProductFailure(error)) {
            throw error;
          }

          log.warn({ productCode, code: error.code, error: error.message }, 'Product forecast failed, omitting product');
          outcome.failures.push({ productCode, batchIndex, code: error.code, reason: error.message });
          ctx.tracker.emit({ type: 'product_failed', batchIndex, productCode, code: error.code, reason: error.message });
        }
      }

      log.debug({ forecasts: outcome.forecasts.length, failures: outcome.failures.length }, 'Batch worker finished');
      return outcome;
    });
  }

  private snapshotDiagnostics(diagnostics: MutableDiagnostics, tracker: PipelineStageTracker): PipelineDiagnostics {
    return { ...diagnostics, stages: tracker.stages };
  }
}

/**
 * Run the forecasting pipeline once
 *
 * @param productCodes - Products to forecast; repeats are collapsed
 * @param config - Overrides of the default pipeline configuration
 * @param dependencies - External collaborators (signal source, document index, data providers)
 * @param options - Cancellation signal, progress listener, run ID and clock
 * @throws {ConfigInvalidError} when the configuration or product codes are invalid
 */
export async function runPipeline(
  productCodes: readonly string[],
  config: PipelineConfigInput,
  dependencies: PipelineDependencies,
  options: RunPipelineOptions = {}
): Promise<PipelineRunResult> {
  return new ForecastPipelineRunner(dependencies).run(productCodes, config, options);
}
