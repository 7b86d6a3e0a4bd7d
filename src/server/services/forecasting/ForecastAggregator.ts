/**
 * Forecast Aggregator
 *
 * Merges per-batch forecast lists into one AggregatedForecastSet. Output order is batch
 * order, then order within each batch, independent of the order in which batches finished.
 */

import type { AggregatedForecastSet, ProductForecast } from '../../contracts/types.js';

export function aggregateForecasts(batchResults: readonly (readonly ProductForecast[])[]): AggregatedForecastSet {
  const forecasts = batchResults.flat();
  const totalForecastUnits = forecasts.reduce((sum, forecast) => sum + forecast.forecastUnits, 0);

  return {
    totalProducts: forecasts.length,
    totalForecastUnits,
    averagePerProduct: forecasts.length > 0 ? totalForecastUnits / forecasts.length : 0,
    forecasts,
  };
}

export const EMPTY_FORECAST_SET: AggregatedForecastSet = aggregateForecasts([]);
