/**
 * Pipeline Configuration
 *
 * Defaults, validation and environment mapping for a forecasting run.
 */

import { ConfigInvalidError } from '../types/errors.js';
import { formatIssues, pipelineConfigSchema } from '../validation/pipelineSchemas.js';
import { DEFAULT_TIMEOUTS } from '../utils/withTimeout.js';
import { validateEnv, type Env } from './env.js';

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  multiplier: number;
}

export interface PipelineConfig {
  /** Number of batches, and so of concurrent batch workers */
  batchCount: number;
  /** Minimum absolute percent change that raises an alert */
  alertThresholdPercent: number;
  /** Absolute percent change above which an alert is `high` rather than `medium` */
  highSeverityThresholdPercent: number;
  /** Market factor applied when the derived trend is `stable` */
  defaultMarketFactor: number;
  /** Market factor applied when the derived trend is `increasing` */
  growthMarketFactor: number;
  periodLengthDays: number;
  /** Inventory at or below this level is reported as `low` */
  inventoryFloor: number;
  /** Candidates requested from the index per product */
  insightTopN: number;
  /** Candidates summarized into the market insight */
  maxInsights: number;
  /** Confidence assigned when no insight is found */
  defaultInsightConfidence: number;
  fetchTimeoutMs: number;
  queryTimeoutMs: number;
  retry: RetryPolicy;
}

export type PipelineConfigInput = Partial<Omit<PipelineConfig, 'retry'>> & {
  retry?: Partial<RetryPolicy>;
};

/**
 * Default pipeline configuration
 */
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  batchCount: 5,
  alertThresholdPercent: 10,
  highSeverityThresholdPercent: 20,
  defaultMarketFactor: 1.0,
  growthMarketFactor: 1.15,
  periodLengthDays: 90,
  inventoryFloor: 400,
  insightTopN: 5,
  maxInsights: 3,
  defaultInsightConfidence: 0.5,
  fetchTimeoutMs: DEFAULT_TIMEOUTS.SIGNAL_FETCH,
  queryTimeoutMs: DEFAULT_TIMEOUTS.INDEX_QUERY,
  retry: {
    maxAttempts: 3,
    initialDelay: 500,
    maxDelay: 5000,
    multiplier: 2,
  },
};

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @throws {ConfigInvalidError} when any value is out of range
 */
export function resolvePipelineConfig(overrides: PipelineConfigInput = {}, base: PipelineConfig = DEFAULT_PIPELINE_CONFIG): PipelineConfig {
  const merged = {
    ...base,
    ...overrides,
    retry: { ...base.retry, ...overrides.retry },
  };

  const parsed = pipelineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigInvalidError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Pipeline configuration derived from environment variables
 */
export function getPipelineConfigFromEnv(env: Env = validateEnv()): PipelineConfig {
  return resolvePipelineConfig({
    batchCount: env.FORECAST_BATCH_COUNT,
    alertThresholdPercent: env.FORECAST_ALERT_THRESHOLD_PERCENT,
    highSeverityThresholdPercent: env.FORECAST_HIGH_SEVERITY_THRESHOLD_PERCENT,
    defaultMarketFactor: env.FORECAST_DEFAULT_MARKET_FACTOR,
    growthMarketFactor: env.FORECAST_GROWTH_MARKET_FACTOR,
    periodLengthDays: env.FORECAST_PERIOD_LENGTH_DAYS,
    inventoryFloor: env.FORECAST_INVENTORY_FLOOR,
    fetchTimeoutMs: env.SIGNAL_FETCH_TIMEOUT_MS,
    queryTimeoutMs: env.INDEX_QUERY_TIMEOUT_MS,
    retry: {
      maxAttempts: env.PIPELINE_MAX_RETRIES,
      initialDelay: env.PIPELINE_RETRY_INITIAL_DELAY_MS,
    },
  });
}
