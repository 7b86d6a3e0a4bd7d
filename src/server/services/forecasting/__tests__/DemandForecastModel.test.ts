import { describe, it, expect } from 'vitest';
import { BaselineForecastModel, assertValidForecast, nextQuarterLabel } from '../DemandForecastModel.js';
import { InvalidForecastError } from '../../../types/errors.js';
import type { ProductForecast } from '../../../contracts/types.js';
import { makeFeatures } from './fixtures.js';

const context = {
  period: 'Q1_2025',
  periodLengthDays: 90,
  generatedAt: new Date('2024-10-15T00:00:00.000Z'),
};

describe('BaselineForecastModel', () => {
  const model = new BaselineForecastModel({ defaultMarketFactor: 1.0, growthMarketFactor: 1.15 });

  it('applies the growth factor for an increasing trend', () => {
    expect(model.predict(makeFeatures('increasing'), context)).toEqual({
      productCode: 'BAT-100',
      period: 'Q1_2025',
      forecastUnits: 12213,
      confidenceInterval: { lower: 10381, upper: 14045 },
      method: 'baseline_with_market_adjustment',
      generatedAt: context.generatedAt,
    });
  });

  it('applies the default factor for a stable trend', () => {
    const forecast = model.predict(makeFeatures('stable'), context);

    expect(forecast.forecastUnits).toBe(10620);
    expect(forecast.confidenceInterval).toEqual({ lower: 9027, upper: 12213 });
  });

  it('forecasts zero without sales history', () => {
    const forecast = model.predict(
      makeFeatures('increasing', { historicalSales: [], inventoryLevel: 0, productionPlans: [] }),
      context
    );

    expect(forecast.forecastUnits).toBe(0);
    expect(forecast.confidenceInterval).toEqual({ lower: 0, upper: 0 });
  });
});

describe('nextQuarterLabel', () => {
  it.each([
    ['2024-10-15T00:00:00.000Z', 'Q1_2025'],
    ['2024-01-01T00:00:00.000Z', 'Q2_2024'],
    ['2024-06-30T23:59:59.000Z', 'Q3_2024'],
    ['2024-09-01T00:00:00.000Z', 'Q4_2024'],
  ])('labels %s as %s', (iso, label) => {
    expect(nextQuarterLabel(new Date(iso))).toBe(label);
  });
});

describe('assertValidForecast', () => {
  const valid: ProductForecast = {
    productCode: 'BAT-100',
    period: 'Q1_2025',
    forecastUnits: 100,
    confidenceInterval: { lower: 85, upper: 115 },
    method: 'test',
    generatedAt: new Date('2024-10-15T00:00:00.000Z'),
  };

  it('accepts a forecast inside its interval', () => {
    expect(() => assertValidForecast(valid)).not.toThrow();
  });

  it('rejects a forecast outside its interval', () => {
    expect(() => assertValidForecast({ ...valid, confidenceInterval: { lower: 101, upper: 115 } })).toThrow(InvalidForecastError);
  });

  it('rejects negative or fractional units', () => {
    expect(() => assertValidForecast({ ...valid, forecastUnits: -1, confidenceInterval: { lower: -2, upper: 0 } })).toThrow(
      InvalidForecastError
    );
    expect(() => assertValidForecast({ ...valid, forecastUnits: 100.5 })).toThrow(InvalidForecastError);
  });
});
