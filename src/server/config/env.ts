/**
 * Environment Variable Validation
 *
 * Centralized parsing and validation of all environment variables read by the pipeline
 * and its command-line entry point.
 */

// Load dotenv early to ensure environment variables are available before anything reads them
import * as dotenv from 'dotenv';
dotenv.config();

import { logger } from '../utils/logger.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

export type NodeEnv = 'development' | 'production' | 'test';

function isNodeEnv(value: string): value is NodeEnv {
  return value === 'development' || value === 'production' || value === 'test';
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;

  // Forecast policy
  FORECAST_BATCH_COUNT: number;
  FORECAST_ALERT_THRESHOLD_PERCENT: number;
  FORECAST_HIGH_SEVERITY_THRESHOLD_PERCENT: number;
  FORECAST_DEFAULT_MARKET_FACTOR: number;
  FORECAST_GROWTH_MARKET_FACTOR: number;
  FORECAST_PERIOD_LENGTH_DAYS: number;
  FORECAST_INVENTORY_FLOOR: number;

  // I/O
  SIGNAL_FETCH_TIMEOUT_MS: number;
  INDEX_QUERY_TIMEOUT_MS: number;
  PIPELINE_MAX_RETRIES: number;
  PIPELINE_RETRY_INITIAL_DELAY_MS: number;

  FORECAST_REPORT_DIR: string;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const batchCount = parseNumericEnv(process.env.FORECAST_BATCH_COUNT, 5);
  if (batchCount < 1) {
    errors.push(`FORECAST_BATCH_COUNT: Invalid value "${process.env.FORECAST_BATCH_COUNT}". Must be at least 1.`);
  }
  if (batchCount > 64) {
    logger.warn(`FORECAST_BATCH_COUNT (${batchCount}) is greater than 64. Each batch runs as its own concurrent worker.`);
  }

  const alertThreshold = parseFloatEnv(process.env.FORECAST_ALERT_THRESHOLD_PERCENT, 10);
  if (alertThreshold < 0) {
    errors.push(`FORECAST_ALERT_THRESHOLD_PERCENT: Invalid value "${process.env.FORECAST_ALERT_THRESHOLD_PERCENT}". Must be 0 or greater.`);
  }

  const highSeverityThreshold = parseFloatEnv(process.env.FORECAST_HIGH_SEVERITY_THRESHOLD_PERCENT, 20);
  if (highSeverityThreshold < alertThreshold) {
    errors.push(
      `FORECAST_HIGH_SEVERITY_THRESHOLD_PERCENT (${highSeverityThreshold}) cannot be lower than FORECAST_ALERT_THRESHOLD_PERCENT (${alertThreshold}).`
    );
  }

  const periodLengthDays = parseNumericEnv(process.env.FORECAST_PERIOD_LENGTH_DAYS, 90);
  if (periodLengthDays < 1) {
    errors.push(`FORECAST_PERIOD_LENGTH_DAYS: Invalid value "${process.env.FORECAST_PERIOD_LENGTH_DAYS}". Must be at least 1.`);
  }

  const maxRetries = parseNumericEnv(process.env.PIPELINE_MAX_RETRIES, 3);
  if (maxRetries < 0) {
    errors.push(`PIPELINE_MAX_RETRIES: Invalid value "${process.env.PIPELINE_MAX_RETRIES}". Must be 0 or greater.`);
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new Error(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`
    );
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,

    FORECAST_BATCH_COUNT: batchCount,
    FORECAST_ALERT_THRESHOLD_PERCENT: alertThreshold,
    FORECAST_HIGH_SEVERITY_THRESHOLD_PERCENT: highSeverityThreshold,
    FORECAST_DEFAULT_MARKET_FACTOR: parseFloatEnv(process.env.FORECAST_DEFAULT_MARKET_FACTOR, 1.0),
    FORECAST_GROWTH_MARKET_FACTOR: parseFloatEnv(process.env.FORECAST_GROWTH_MARKET_FACTOR, 1.15),
    FORECAST_PERIOD_LENGTH_DAYS: periodLengthDays,
    FORECAST_INVENTORY_FLOOR: parseNumericEnv(process.env.FORECAST_INVENTORY_FLOOR, 400),

    SIGNAL_FETCH_TIMEOUT_MS: parseNumericEnv(process.env.SIGNAL_FETCH_TIMEOUT_MS, 30000),
    INDEX_QUERY_TIMEOUT_MS: parseNumericEnv(process.env.INDEX_QUERY_TIMEOUT_MS, 10000),
    PIPELINE_MAX_RETRIES: maxRetries,
    PIPELINE_RETRY_INITIAL_DELAY_MS: parseNumericEnv(process.env.PIPELINE_RETRY_INITIAL_DELAY_MS, 500),

    FORECAST_REPORT_DIR: process.env.FORECAST_REPORT_DIR || './reports',
  };

  return validatedEnv;
}

/**
 * Drop the cached environment so the next {@link validateEnv} call re-reads `process.env`
 */
export function resetEnvCache(): void {
  validatedEnv = null;
}
