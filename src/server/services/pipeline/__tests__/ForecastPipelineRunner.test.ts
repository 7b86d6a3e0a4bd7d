import { describe, it, expect, vi } from 'vitest';
import type {
  CallOptions,
  DocumentIndex,
  ExternalSignalSource,
  FusedFeatureSet,
  InsightCandidate,
  InternalDataProvider,
  InternalProductData,
  NormalizedDocument,
  ProductForecast,
  RawDocument,
} from '../../../contracts/types.js';
import type { PipelineProgressEvent } from '../../../types/progress.js';
import { ConfigInvalidError, ErrorCode, IndexUnavailableError } from '../../../types/errors.js';
import { InMemoryDocumentIndex } from '../../../vector/InMemoryDocumentIndex.js';
import { StaticSignalSource } from '../../ingestion/StaticSignalSource.js';
import { BaselineForecastModel, type ForecastContext, type ForecastModel } from '../../forecasting/DemandForecastModel.js';
import { InMemoryInternalDataProvider } from '../../internal/InMemoryInternalDataProvider.js';
import { InMemoryPriorForecastProvider } from '../../internal/InMemoryPriorForecastProvider.js';
import { ForecastPipelineRunner, normalizeProductCodes, runPipeline, type PipelineDependencies } from '../ForecastPipelineRunner.js';

const RUN_DATE = new Date('2024-10-15T00:00:00.000Z');
const now = () => new Date(RUN_DATE.getTime());

const FLAT_HISTORY: InternalProductData = { historicalSales: [10, 10, 10], inventoryLevel: 500, productionPlans: [] };

const SIGNALS: RawDocument[] = [
  { source: 'digest', content: 'Inverter prices stable across the market.', publishedAt: new Date('2024-10-01T00:00:00.000Z'), category: 'pricing' },
  { source: 'digest', content: 'Inverter prices stable across the market.', publishedAt: new Date('2024-09-01T00:00:00.000Z'), category: 'pricing' },
  { source: 'regulator', content: 'Charging subsidies announced for municipalities.', publishedAt: new Date('2024-10-02T00:00:00.000Z'), category: 'policy' },
];

const FAST_RETRY = { retry: { maxAttempts: 1, initialDelay: 0, maxDelay: 0 } };

function productCodes(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `P${String(i + 1).padStart(2, '0')}`);
}

function createDependencies(codes: string[], overrides: Partial<PipelineDependencies> = {}): PipelineDependencies {
  return {
    signalSource: new StaticSignalSource(SIGNALS, 'test-signals'),
    documentIndex: new InMemoryDocumentIndex(),
    internalData: new InMemoryInternalDataProvider(codes.map(code => [code, FLAT_HISTORY] as const)),
    ...overrides,
  };
}

/**
 * Delegates to an in-memory index but fails queries for the given products
 */
class PartiallyFailingIndex implements DocumentIndex {
  private readonly inner = new InMemoryDocumentIndex();

  constructor(private readonly failingCodes: ReadonlySet<string>) {}

  store(documents: readonly NormalizedDocument[], options?: CallOptions) {
    return this.inner.store(documents, options);
  }

  async queryTopN(productCode: string, n: number, options?: CallOptions): Promise<InsightCandidate[]> {
    if (this.failingCodes.has(productCode)) {
      throw new IndexUnavailableError('offline');
    }
    return this.inner.queryTopN(productCode, n, options);
  }
}

/**
 * Baseline model that misbehaves for selected products
 */
class SabotagedModel implements ForecastModel {
  readonly method = 'sabotaged';
  private readonly baseline = new BaselineForecastModel({ defaultMarketFactor: 1.0, growthMarketFactor: 1.15 });

  constructor(private readonly behaviour: Record<string, 'crash' | 'invalid'>) {}

  predict(features: FusedFeatureSet, context: ForecastContext): ProductForecast {
    const forecast = this.baseline.predict(features, context);
    const mode = this.behaviour[features.productCode];
    if (mode === 'crash') {
      throw new Error('model crashed');
    }
    if (mode === 'invalid') {
      return { ...forecast, confidenceInterval: { lower: forecast.forecastUnits + 1, upper: forecast.forecastUnits + 2 } };
    }
    return forecast;
  }
}

function describeEvent(event: PipelineProgressEvent): string {
  switch (event.type) {
    case 'stage_started':
    case 'stage_completed':
    case 'stage_failed':
      return `${event.type}:${event.stage}`;
    case 'batch_completed':
      return `${event.type}:${event.batchIndex}`;
    case 'product_failed':
      return `${event.type}:${event.productCode}`;
  }
}

describe('ForecastPipelineRunner', () => {
  it('forecasts every product and alerts against the synthetic baseline', async () => {
    const codes = productCodes(3);

    const result = await runPipeline(codes, { batchCount: 5, ...FAST_RETRY }, createDependencies(codes), {
      runId: 'run-1',
      now,
    });

    expect(result.runId).toBe('run-1');
    expect(result.status).toBe('completed');
    expect(result.incomplete).toBe(false);
    expect(result.error).toBeUndefined();
    expect(result.generatedAt).toEqual(RUN_DATE);

    expect(result.aggregatedForecasts.forecasts.map(f => f.productCode)).toEqual(['P01', 'P02', 'P03']);
    expect(result.aggregatedForecasts.forecasts[0]).toEqual({
      productCode: 'P01',
      period: 'Q1_2025',
      forecastUnits: 900,
      confidenceInterval: { lower: 765, upper: 1035 },
      method: 'baseline_with_market_adjustment',
      generatedAt: RUN_DATE,
    });
    expect(result.aggregatedForecasts.totalForecastUnits).toBe(2700);
    expect(result.aggregatedForecasts.averagePerProduct).toBe(900);

    expect(result.alerts).toHaveLength(3);
    expect(result.alerts[0]).toEqual({
      productCode: 'P01',
      changePercent: 11.11,
      severity: 'medium',
      message: 'Demand change of 11.1% detected for P01',
      forecastUnits: 900,
      previousUnits: 810,
      baselineSource: 'synthetic',
    });
    expect(result.alertSummary).toEqual({ total: 3, high: 0, medium: 3 });
  });

  it('records diagnostics for every stage', async () => {
    const codes = productCodes(3);

    const { diagnostics } = await runPipeline(codes, { batchCount: 5, ...FAST_RETRY }, createDependencies(codes), { now });

    expect(diagnostics).toMatchObject({
      documentsIngested: 3,
      documentsNormalized: 2,
      duplicatesRemoved: 1,
      documentsIndexed: 2,
      batchCount: 3,
    });
    expect(diagnostics.stages.map(stage => `${stage.stage}:${stage.status}`)).toEqual([
      'INGESTING:completed',
      'NORMALIZING:completed',
      'INDEXING:completed',
      'PLANNING:completed',
      'FORECASTING:completed',
      'AGGREGATING:completed',
      'ALERTING:completed',
      'DONE:completed',
    ]);
    expect(diagnostics.stages[0].durationMs).toBe(0);
  });

  it('omits a product whose retrieval fails and keeps its siblings', async () => {
    const codes = productCodes(10);
    const events: PipelineProgressEvent[] = [];

    const result = await runPipeline(
      codes,
      { batchCount: 5, ...FAST_RETRY },
      createDependencies(codes, { documentIndex: new PartiallyFailingIndex(new Set(['P04'])) }),
      { now, onProgress: event => events.push(event) }
    );

    expect(result.status).toBe('completedWithOmissions');
    expect(result.incomplete).toBe(false);
    expect(result.aggregatedForecasts.totalProducts).toBe(9);
    expect(result.aggregatedForecasts.forecasts.map(f => f.productCode)).toEqual(
      codes.filter(code => code !== 'P04')
    );
    expect(result.failures).toEqual([
      {
        productCode: 'P04',
        batchIndex: 1,
        code: ErrorCode.INDEX_UNAVAILABLE,
        reason: 'Document index unavailable: offline',
      },
    ]);
    expect(result.alertSummary.total).toBe(9);

    const batchEvent = events.find(event => event.type === 'batch_completed' && event.batchIndex === 1);
    expect(batchEvent).toMatchObject({ forecastsProduced: 1, productsFailed: 1, productsSkipped: 0 });
    expect(events.filter(event => event.type === 'product_failed').map(describeEvent)).toEqual(['product_failed:P04']);
  });

  it('reports products missing from internal data as failures', async () => {
    const codes = ['P01', 'UNKNOWN'];

    const result = await runPipeline(codes, { batchCount: 2, ...FAST_RETRY }, createDependencies(['P01']), { now });

    expect(result.status).toBe('completedWithOmissions');
    expect(result.failures).toEqual([
      {
        productCode: 'UNKNOWN',
        batchIndex: 1,
        code: ErrorCode.PRODUCT_NOT_FOUND,
        reason: "Internal data for product 'UNKNOWN' not found",
      },
    ]);
  });

  it('omits a product whose forecast breaks its own interval', async () => {
    const codes = productCodes(2);

    const result = await runPipeline(
      codes,
      { batchCount: 1, ...FAST_RETRY },
      createDependencies(codes, { forecastModel: new SabotagedModel({ P01: 'invalid' }) }),
      { now }
    );

    expect(result.aggregatedForecasts.forecasts.map(f => f.productCode)).toEqual(['P02']);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]).toMatchObject({ productCode: 'P01', batchIndex: 0, code: ErrorCode.INVALID_FORECAST });
  });

  it('drops the whole batch when its worker fails unexpectedly', async () => {
    const codes = productCodes(4);

    const result = await runPipeline(
      codes,
      { batchCount: 2, ...FAST_RETRY },
      createDependencies(codes, { forecastModel: new SabotagedModel({ P03: 'crash' }) }),
      { now }
    );

    expect(result.status).toBe('completedWithOmissions');
    expect(result.aggregatedForecasts.forecasts.map(f => f.productCode)).toEqual(['P01', 'P02']);
    expect(result.failures).toEqual([
      { productCode: 'P03', batchIndex: 1, code: ErrorCode.BATCH_WORKER_FAILED, reason: 'model crashed' },
      { productCode: 'P04', batchIndex: 1, code: ErrorCode.BATCH_WORKER_FAILED, reason: 'model crashed' },
    ]);
  });

  it('fails the run when the signal source is unavailable', async () => {
    const codes = productCodes(2);
    const signalSource: ExternalSignalSource = {
      name: 'flaky',
      fetch: async () => {
        throw new Error('connection refused');
      },
    };
    const events: PipelineProgressEvent[] = [];

    const result = await runPipeline(codes, FAST_RETRY, createDependencies(codes, { signalSource }), {
      now,
      onProgress: event => events.push(event),
    });

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({
      stage: 'INGESTING',
      code: ErrorCode.SOURCE_UNAVAILABLE,
      message: 'Signal source unavailable (flaky): connection refused',
    });
    expect(result.aggregatedForecasts.totalProducts).toBe(0);
    expect(result.alerts).toEqual([]);
    expect(result.diagnostics.stages.map(stage => `${stage.stage}:${stage.status}`)).toEqual(['INGESTING:failed']);
    expect(events.map(describeEvent)).toEqual(['stage_started:INGESTING', 'stage_failed:INGESTING']);
  });

  it('treats a fetch timeout as an unavailable source', async () => {
    const codes = productCodes(1);
    const signalSource: ExternalSignalSource = {
      name: 'slow',
      fetch: () => new Promise<RawDocument[]>(() => undefined),
    };

    const result = await runPipeline(
      codes,
      { fetchTimeoutMs: 5, ...FAST_RETRY },
      createDependencies(codes, { signalSource }),
      { now }
    );

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({
      stage: 'INGESTING',
      code: ErrorCode.SOURCE_UNAVAILABLE,
      message: 'Signal source unavailable (slow): slow.fetch timed out after 5ms',
    });
  });

  it('fails the run at INDEXING once store retries are exhausted', async () => {
    const codes = productCodes(2);
    const documentIndex = new InMemoryDocumentIndex();
    documentIndex.setAvailable(false);
    const store = vi.spyOn(documentIndex, 'store');

    const result = await runPipeline(codes, FAST_RETRY, createDependencies(codes, { documentIndex }), { now });

    expect(store).toHaveBeenCalledTimes(2);
    expect(result.status).toBe('failed');
    expect(result.error).toMatchObject({ stage: 'INDEXING', code: ErrorCode.INDEX_UNAVAILABLE });
    expect(result.diagnostics).toMatchObject({ documentsIngested: 3, documentsNormalized: 2, documentsIndexed: 0 });
  });

  it('rejects invalid configuration before any stage runs', async () => {
    const codes = productCodes(2);
    const signalSource = new StaticSignalSource(SIGNALS);
    const fetch = vi.spyOn(signalSource, 'fetch');

    await expect(runPipeline(codes, { batchCount: 0 }, createDependencies(codes, { signalSource }))).rejects.toBeInstanceOf(
      ConfigInvalidError
    );
    await expect(runPipeline(['P01', '  '], {}, createDependencies(codes, { signalSource }))).rejects.toBeInstanceOf(
      ConfigInvalidError
    );
    expect(fetch).not.toHaveBeenCalled();
  });

  it('collapses repeated product codes', async () => {
    const codes = productCodes(2);

    const result = await runPipeline(['P01', 'P01', ' P02 '], { batchCount: 3, ...FAST_RETRY }, createDependencies(codes), {
      now,
    });

    expect(result.aggregatedForecasts.forecasts.map(f => f.productCode)).toEqual(['P01', 'P02']);
    expect(result.diagnostics.batchCount).toBe(2);
  });

  it('completes with no forecasts for an empty product list', async () => {
    const result = await runPipeline([], FAST_RETRY, createDependencies([]), { now });

    expect(result.status).toBe('completed');
    expect(result.aggregatedForecasts).toEqual({ totalProducts: 0, totalForecastUnits: 0, averagePerProduct: 0, forecasts: [] });
    expect(result.diagnostics.batchCount).toBe(0);
  });

  it('emits stage and batch events in order', async () => {
    const codes = productCodes(2);
    const events: PipelineProgressEvent[] = [];

    await runPipeline(codes, { batchCount: 2, ...FAST_RETRY }, createDependencies(codes), {
      runId: 'run-events',
      now,
      onProgress: event => events.push(event),
    });

    expect(events.map(describeEvent)).toEqual([
      'stage_started:INGESTING',
      'stage_completed:INGESTING',
      'stage_started:NORMALIZING',
      'stage_completed:NORMALIZING',
      'stage_started:INDEXING',
      'stage_completed:INDEXING',
      'stage_started:PLANNING',
      'stage_completed:PLANNING',
      'stage_started:FORECASTING',
      'batch_completed:0',
      'batch_completed:1',
      'stage_completed:FORECASTING',
      'stage_started:AGGREGATING',
      'stage_completed:AGGREGATING',
      'stage_started:ALERTING',
      'stage_completed:ALERTING',
      'stage_started:DONE',
      'stage_completed:DONE',
    ]);
    expect(events.every(event => event.runId === 'run-events')).toBe(true);
  });

  it('ignores a progress listener that throws', async () => {
    const codes = productCodes(1);

    const result = await runPipeline(codes, FAST_RETRY, createDependencies(codes), {
      now,
      onProgress: () => {
        throw new Error('listener broke');
      },
    });

    expect(result.status).toBe('completed');
  });

  it('runs batch workers concurrently up to batchCount', async () => {
    const codes = productCodes(6);
    const inner = new InMemoryInternalDataProvider(codes.map(code => [code, FLAT_HISTORY] as const));
    let active = 0;
    let peak = 0;
    const internalData: InternalDataProvider = {
      getHistory: async (productCode, options) => {
        active++;
        peak = Math.max(peak, active);
        await new Promise(resolve => setTimeout(resolve, 5));
        active--;
        return inner.getHistory(productCode, options);
      },
    };

    const result = await runPipeline(codes, { batchCount: 3, ...FAST_RETRY }, createDependencies(codes, { internalData }), {
      now,
    });

    expect(result.aggregatedForecasts.totalProducts).toBe(6);
    expect(peak).toBe(3);
  });

  it('finishes in-flight products and skips the rest when cancelled', async () => {
    const codes = productCodes(4);
    const controller = new AbortController();
    const inner = new InMemoryInternalDataProvider(codes.map(code => [code, FLAT_HISTORY] as const));
    const internalData: InternalDataProvider = {
      getHistory: async (productCode, options) => {
        if (productCode === 'P01') {
          controller.abort();
        }
        return inner.getHistory(productCode, options);
      },
    };

    const result = await runPipeline(codes, { batchCount: 1, ...FAST_RETRY }, createDependencies(codes, { internalData }), {
      now,
      signal: controller.signal,
    });

    expect(result.status).toBe('completedWithOmissions');
    expect(result.incomplete).toBe(true);
    expect(result.aggregatedForecasts.forecasts.map(f => f.productCode)).toEqual(['P01']);
    expect(result.skippedProducts).toEqual(['P02', 'P03', 'P04']);
    expect(result.failures).toEqual([]);
  });

  it('skips every product when cancelled before the run starts', async () => {
    const codes = productCodes(2);
    const controller = new AbortController();
    controller.abort();
    const fetch = vi.fn(async () => SIGNALS);

    const result = await runPipeline(
      codes,
      FAST_RETRY,
      createDependencies(codes, { signalSource: { name: 'watched', fetch } }),
      { now, signal: controller.signal }
    );

    expect(fetch).not.toHaveBeenCalled();
    expect(result.status).toBe('completedWithOmissions');
    expect(result.incomplete).toBe(true);
    expect(result.error).toBeUndefined();
    expect(result.skippedProducts).toEqual(['P01', 'P02']);
    expect(result.failures).toEqual([]);
    expect(result.aggregatedForecasts.totalProducts).toBe(0);
    expect(result.alerts).toEqual([]);
    expect(result.diagnostics.stages.map(s => [s.stage, s.status])).toEqual([
      ['AGGREGATING', 'completed'],
      ['ALERTING', 'completed'],
      ['DONE', 'completed'],
    ]);
  });

  it('treats a fetch that fails because of cancellation as cancelled, not as a source outage', async () => {
    const codes = productCodes(3);
    const controller = new AbortController();
    const signalSource: ExternalSignalSource = {
      name: 'wire',
      fetch: async () => {
        controller.abort();
        throw new Error('connection reset');
      },
    };

    const result = await runPipeline(codes, FAST_RETRY, createDependencies(codes, { signalSource }), {
      now,
      signal: controller.signal,
    });

    expect(result.status).toBe('completedWithOmissions');
    expect(result.incomplete).toBe(true);
    expect(result.error).toBeUndefined();
    expect(result.skippedProducts).toEqual(['P01', 'P02', 'P03']);
    expect(result.diagnostics.documentsIngested).toBe(0);
    expect(result.diagnostics.stages.map(s => [s.stage, s.status])).toEqual([
      ['INGESTING', 'cancelled'],
      ['AGGREGATING', 'completed'],
      ['ALERTING', 'completed'],
      ['DONE', 'completed'],
    ]);
  });

  it('compares against a previous run when one is supplied', async () => {
    const codes = productCodes(2);
    const runner = new ForecastPipelineRunner(createDependencies(codes));
    const first = await runner.run(codes, FAST_RETRY, { now });

    const second = await runPipeline(
      codes,
      FAST_RETRY,
      createDependencies(codes, { priorForecasts: InMemoryPriorForecastProvider.fromRunResult(first) }),
      { now }
    );

    expect(first.alertSummary.total).toBe(2);
    expect(second.alerts).toEqual([]);
  });
});

describe('normalizeProductCodes', () => {
  it('trims and de-duplicates codes', () => {
    expect(normalizeProductCodes([' A ', 'B', 'A'])).toEqual(['A', 'B']);
  });

  it('rejects empty codes with the offending index', () => {
    try {
      normalizeProductCodes(['A', '']);
      expect.unreachable('normalizeProductCodes should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigInvalidError);
      if (error instanceof ConfigInvalidError) {
        expect(error.issues).toEqual(['productCodes.1: String cannot be empty']);
      }
    }
  });
});
