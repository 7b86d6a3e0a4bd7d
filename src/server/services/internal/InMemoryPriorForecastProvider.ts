/**
 * In-memory PriorForecastProvider
 *
 * Holds the previous forecast units per product. `fromRunResult` seeds it from an earlier
 * run so consecutive runs compare against real history instead of the synthetic baseline.
 */

import type { CallOptions, PriorForecastProvider } from '../../contracts/types.js';

/**
 * Anything carrying the forecasts of a finished run: a PipelineRunResult or a report read back from disk
 */
export interface PriorRunLike {
  aggregatedForecasts: {
    forecasts: readonly { productCode: string; forecastUnits: number }[];
  };
}

export class InMemoryPriorForecastProvider implements PriorForecastProvider {
  private readonly previous: Map<string, number>;

  constructor(entries: Iterable<readonly [string, number]> = []) {
    this.previous = new Map(entries);
  }

  async getPrevious(productCode: string, _options?: CallOptions): Promise<number | undefined> {
    return this.previous.get(productCode);
  }

  static fromRunResult(run: PriorRunLike): InMemoryPriorForecastProvider {
    return new InMemoryPriorForecastProvider(
      run.aggregatedForecasts.forecasts.map(forecast => [forecast.productCode, forecast.forecastUnits] as const)
    );
  }
}
