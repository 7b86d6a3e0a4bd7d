/**
 * Demand Forecast Models
 *
 * A ForecastModel turns fused features into a ProductForecast. BaselineForecastModel is a
 * deterministic rule standing in for a trained model:
 *
 *   forecastUnits = round(mean(historicalSales) × marketFactor × periodLengthDays)
 *   interval      = [round(forecastUnits × 0.85), round(forecastUnits × 1.15)]
 *
 * where marketFactor is the growth factor for an `increasing` trend and the default factor
 * otherwise. Any replacement model must keep `lower <= forecastUnits <= upper`.
 */

import type { FusedFeatureSet, ProductForecast } from '../../contracts/types.js';
import { InvalidForecastError } from '../../types/errors.js';
import { mean, roundHalfUp } from '../../utils/numberUtils.js';

export interface ForecastContext {
  /** Period label, e.g. `Q1_2025` */
  period: string;
  periodLengthDays: number;
  generatedAt: Date;
}

export interface ForecastModel {
  readonly method: string;
  predict(features: FusedFeatureSet, context: ForecastContext): ProductForecast;
}

export interface BaselineForecastModelOptions {
  defaultMarketFactor: number;
  growthMarketFactor: number;
  /** Relative half-width of the confidence interval (default 0.15) */
  intervalSpread?: number;
}

export class BaselineForecastModel implements ForecastModel {
  readonly method = 'baseline_with_market_adjustment';
  private readonly intervalSpread: number;

  constructor(private readonly options: BaselineForecastModelOptions) {
    this.intervalSpread = options.intervalSpread ?? 0.15;
  }

  predict(features: FusedFeatureSet, context: ForecastContext): ProductForecast {
    const avgSales = mean(features.internalData.historicalSales);
    const marketFactor = features.derivedFeatures.trend === 'increasing'
      ? this.options.growthMarketFactor
      : this.options.defaultMarketFactor;

    const forecastUnits = Math.max(0, roundHalfUp(avgSales * marketFactor * context.periodLengthDays));

    return {
      productCode: features.productCode,
      period: context.period,
      forecastUnits,
      confidenceInterval: {
        lower: roundHalfUp(forecastUnits * (1 - this.intervalSpread)),
        upper: roundHalfUp(forecastUnits * (1 + this.intervalSpread)),
      },
      method: this.method,
      generatedAt: context.generatedAt,
    };
  }
}

/**
 * Label of the calendar quarter after `date` (UTC): 2024-10-15 -> `Q1_2025`
 */
export function nextQuarterLabel(date: Date): string {
  const currentQuarter = Math.floor(date.getUTCMonth() / 3) + 1;
  const nextQuarter = currentQuarter === 4 ? 1 : currentQuarter + 1;
  const year = currentQuarter === 4 ? date.getUTCFullYear() + 1 : date.getUTCFullYear();
  return `Q${nextQuarter}_${year}`;
}

/**
 * @throws {InvalidForecastError} when units are negative or fractional, or fall outside the interval
 */
export function assertValidForecast(forecast: ProductForecast): void {
  const { productCode, forecastUnits, confidenceInterval } = forecast;

  if (!Number.isInteger(forecastUnits) || forecastUnits < 0) {
    throw new InvalidForecastError(productCode, `forecastUnits must be a non-negative integer, got ${forecastUnits}`);
  }
  if (!(confidenceInterval.lower <= forecastUnits && forecastUnits <= confidenceInterval.upper)) {
    throw new InvalidForecastError(
      productCode,
      `interval [${confidenceInterval.lower}, ${confidenceInterval.upper}] does not contain ${forecastUnits}`
    );
  }
}
