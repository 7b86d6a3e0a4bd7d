/**
 * Forecasting pipeline contracts
 *
 * Value objects passed between stages and the interfaces of the external collaborators
 * (signal source, document index, internal data, prior forecasts). Every value object is
 * immutable once created; stages produce new objects rather than mutating their inputs.
 */

import type { ErrorCode } from '../types/errors.js';
import type { PipelineStage, StageRecord } from '../types/progress.js';

// ---------------------------------------------------------------------------
// I/O options
// ---------------------------------------------------------------------------

/**
 * Options accepted by every suspension point (I/O call) of the pipeline
 */
export interface CallOptions {
  /** Caller-supplied timeout in milliseconds */
  timeoutMs?: number;
  /** Run-scoped cancellation signal */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

export type Sentiment = 'positive' | 'neutral' | 'negative';
export type ProductRelevance = 'low' | 'medium' | 'high';

/**
 * Market document as delivered by an external signal source
 */
export interface RawDocument {
  readonly source: string;
  readonly content: string;
  readonly publishedAt: Date;
  /** Category tag assigned by the source, e.g. `market_trend` or `demand_signal` */
  readonly category: string;
}

export interface DocumentTags {
  readonly sentiment: Sentiment;
  /** `EU` or `global` */
  readonly region: string;
  readonly evRelevance: boolean;
  readonly productRelevance: ProductRelevance;
}

export interface NormalizedDocument extends RawDocument {
  readonly cleanedContent: string;
  readonly tags: DocumentTags;
  readonly normalized: true;
}

/**
 * Opaque handle to the embedding stored for a document
 */
export type EmbeddingHandle = string;

export interface IndexedDocumentRef {
  readonly documentId: string;
  readonly embeddingHandle: EmbeddingHandle;
}

/**
 * Document returned by a relevance query, with its score for the queried product
 */
export interface InsightCandidate {
  readonly documentId: string;
  readonly source: string;
  readonly content: string;
  readonly category: string;
  readonly publishedAt: Date;
  readonly tags: DocumentTags;
  /** Similarity score in [0, 1] */
  readonly relevanceScore: number;
}

// ---------------------------------------------------------------------------
// Per-product forecasting
// ---------------------------------------------------------------------------

/**
 * Ordered, duplicate-free slice of the product codes assigned to one batch worker
 */
export type ProductBatch = readonly string[];

export interface MarketInsight {
  readonly productCode: string;
  readonly insightText: string;
  readonly keyFindings: readonly string[];
  /** Mean relevance of the insights used, in [0, 1] */
  readonly confidence: number;
  readonly sourceDocumentIds: readonly string[];
}

export interface InternalProductData {
  readonly historicalSales: readonly number[];
  readonly inventoryLevel: number;
  readonly productionPlans: readonly number[];
}

export type DemandTrend = 'increasing' | 'stable';
export type InventoryStatus = 'adequate' | 'low';

export interface FusedFeatureSet {
  readonly productCode: string;
  readonly internalData: InternalProductData;
  readonly marketInsight: MarketInsight;
  readonly derivedFeatures: {
    readonly trend: DemandTrend;
    readonly marketSignal: readonly string[];
    readonly inventoryStatus: InventoryStatus;
  };
}

export interface ConfidenceInterval {
  readonly lower: number;
  readonly upper: number;
}

/**
 * Invariant: `confidenceInterval.lower <= forecastUnits <= confidenceInterval.upper`
 */
export interface ProductForecast {
  readonly productCode: string;
  /** Forecast period label, e.g. `Q1_2025` */
  readonly period: string;
  readonly forecastUnits: number;
  readonly confidenceInterval: ConfidenceInterval;
  readonly method: string;
  readonly generatedAt: Date;
}

// ---------------------------------------------------------------------------
// Aggregation, alerting and run results
// ---------------------------------------------------------------------------

export interface AggregatedForecastSet {
  readonly totalProducts: number;
  readonly totalForecastUnits: number;
  readonly averagePerProduct: number;
  /** Batch order, then order within the batch */
  readonly forecasts: readonly ProductForecast[];
}

export type AlertSeverity = 'high' | 'medium';

/**
 * Where the comparison baseline of an alert came from: a real prior run, or the
 * synthetic `forecastUnits × 0.9` stand-in used while no history exists
 */
export type BaselineSource = 'history' | 'synthetic';

export interface DemandAlert {
  readonly productCode: string;
  /** Percent change against the baseline, rounded to 2 decimals */
  readonly changePercent: number;
  readonly severity: AlertSeverity;
  readonly message: string;
  readonly forecastUnits: number;
  readonly previousUnits: number;
  readonly baselineSource: BaselineSource;
}

export interface AlertSummary {
  readonly total: number;
  readonly high: number;
  readonly medium: number;
}

export interface ProductFailure {
  readonly productCode: string;
  readonly batchIndex: number;
  readonly code: ErrorCode;
  readonly reason: string;
}

export type PipelineStatus = 'completed' | 'completedWithOmissions' | 'failed';

/**
 * Stage-level failure that aborted the run
 */
export interface PipelineRunError {
  readonly stage: PipelineStage;
  readonly code: ErrorCode;
  readonly message: string;
}

/**
 * Partial state kept for diagnostics, whether or not the run completed
 */
export interface PipelineDiagnostics {
  readonly documentsIngested: number;
  readonly documentsNormalized: number;
  readonly duplicatesRemoved: number;
  readonly documentsIndexed: number;
  readonly batchCount: number;
  readonly stages: readonly StageRecord[];
}

export interface PipelineRunResult {
  readonly runId: string;
  readonly status: PipelineStatus;
  /** True when cancellation stopped workers before every product was started */
  readonly incomplete: boolean;
  readonly aggregatedForecasts: AggregatedForecastSet;
  readonly alerts: readonly DemandAlert[];
  readonly alertSummary: AlertSummary;
  readonly failures: readonly ProductFailure[];
  readonly skippedProducts: readonly string[];
  readonly error?: PipelineRunError;
  readonly diagnostics: PipelineDiagnostics;
  readonly generatedAt: Date;
}

// ---------------------------------------------------------------------------
// External collaborators
// ---------------------------------------------------------------------------

/**
 * Producer of raw market documents. Rejects with `SourceUnavailableError`.
 */
export interface ExternalSignalSource {
  readonly name: string;
  fetch(options?: CallOptions): Promise<RawDocument[]>;
}

/**
 * Content-addressable store that embeds documents for similarity retrieval.
 *
 * Must serve concurrent `queryTopN` calls from several batch workers. Rejects with
 * `IndexUnavailableError` when the backing store cannot be reached.
 */
export interface DocumentIndex {
  /**
   * Idempotent per document: re-storing a document updates its metadata and returns the same ID
   */
  store(documents: readonly NormalizedDocument[], options?: CallOptions): Promise<IndexedDocumentRef[]>;

  /**
   * Top `n` candidates for a product, by descending relevance, ties broken by most recent `publishedAt`
   */
  queryTopN(productCode: string, n: number, options?: CallOptions): Promise<InsightCandidate[]>;
}

/**
 * Source of internal sales, inventory and production data. Rejects with `ProductNotFoundError`.
 */
export interface InternalDataProvider {
  getHistory(productCode: string, options?: CallOptions): Promise<InternalProductData>;
}

/**
 * Previous forecast for a product, or `undefined` when no prior run exists
 */
export interface PriorForecastProvider {
  getPrevious(productCode: string, options?: CallOptions): Promise<number | undefined>;
}
