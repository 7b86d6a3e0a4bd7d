/**
 * Run the demand forecasting pipeline once against the JSON fixtures in src/server/data/
 * and write the run report to FORECAST_REPORT_DIR.
 *
 * Usage:
 *   tsx src/server/scripts/run-forecast-pipeline.ts [PRODUCT_CODE ...]
 *
 * Without product codes, every product in the internal-data fixture is forecast.
 * The most recent report in FORECAST_REPORT_DIR, if any, is the baseline for alerts.
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { getPipelineConfigFromEnv } from '../config/pipelineConfig.js';
import { validateEnv } from '../config/env.js';
import { HashingEmbeddingProvider } from '../embeddings/providers/HashingEmbeddingProvider.js';
import { StaticSignalSource } from '../services/ingestion/StaticSignalSource.js';
import { InMemoryInternalDataProvider } from '../services/internal/InMemoryInternalDataProvider.js';
import { InMemoryPriorForecastProvider } from '../services/internal/InMemoryPriorForecastProvider.js';
import { runPipeline } from '../services/pipeline/ForecastPipelineRunner.js';
import { RunReportWriter } from '../services/pipeline/RunReportWriter.js';
import type { PipelineProgressEvent } from '../types/progress.js';
import { ConfigInvalidError, getErrorMessage } from '../types/errors.js';
import { InMemoryDocumentIndex } from '../vector/InMemoryDocumentIndex.js';

const dataDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../data');

function printProgress(event: PipelineProgressEvent): void {
  switch (event.type) {
    case 'stage_started':
      console.log(`▶️  ${event.stage}`);
      break;
    case 'stage_completed':
      console.log(`   ✓ ${event.stage} (${event.durationMs}ms)`);
      break;
    case 'stage_failed':
      console.error(`   ✗ ${event.stage}: ${event.error}`);
      break;
    case 'batch_completed':
      console.log(
        `   📦 batch ${event.batchIndex}: ${event.forecastsProduced} forecasts, ` +
        `${event.productsFailed} failed, ${event.productsSkipped} skipped`
      );
      break;
    case 'product_failed':
      console.warn(`   ⚠️  ${event.productCode} [${event.code}] ${event.reason}`);
      break;
  }
}

async function main() {
  const env = validateEnv();
  const config = getPipelineConfigFromEnv(env);

  const signalSource = await StaticSignalSource.fromFile(path.join(dataDir, 'sample-signals.json'), 'sample-signals');
  const internalData = await InMemoryInternalDataProvider.fromFile(path.join(dataDir, 'sample-internal-data.json'));

  const reportWriter = new RunReportWriter(path.resolve(process.cwd(), env.FORECAST_REPORT_DIR));
  const previousReport = await reportWriter.findLatest();
  if (previousReport) {
    console.log(`📂 Using run ${previousReport.runId} (${previousReport.generatedAt.toISOString()}) as alert baseline`);
  } else {
    console.log('📂 No previous run report found, alerts use the synthetic baseline');
  }

  const requested = process.argv.slice(2);
  const productCodes = requested.length > 0 ? requested : internalData.productCodes();

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\n🛑 Cancelling run, in-flight products will finish...');
    controller.abort();
  });

  console.log(`🚀 Forecasting ${productCodes.length} products in ${config.batchCount} batches\n`);

  const result = await runPipeline(
    productCodes,
    config,
    {
      signalSource,
      documentIndex: new InMemoryDocumentIndex({ embeddingProvider: new HashingEmbeddingProvider() }),
      internalData,
      priorForecasts: previousReport ? InMemoryPriorForecastProvider.fromRunResult(previousReport) : undefined,
    },
    { signal: controller.signal, onProgress: printProgress }
  );

  console.log('');
  if (result.status === 'failed') {
    console.error(`❌ Run ${result.runId} failed in ${result.error?.stage}: ${result.error?.message}`);
  } else {
    const { aggregatedForecasts, alertSummary } = result;
    console.log(`✅ Run ${result.runId} ${result.status}`);
    console.log(`📊 ${aggregatedForecasts.totalProducts} forecasts, ${aggregatedForecasts.totalForecastUnits} units total`);
    for (const forecast of aggregatedForecasts.forecasts) {
      console.log(
        `   ${forecast.productCode.padEnd(10)} ${String(forecast.forecastUnits).padStart(8)} ` +
        `[${forecast.confidenceInterval.lower}, ${forecast.confidenceInterval.upper}] ${forecast.period}`
      );
    }
    console.log(`🔔 ${alertSummary.total} alerts (${alertSummary.high} high, ${alertSummary.medium} medium)`);
    for (const alert of result.alerts) {
      console.log(`   [${alert.severity}] ${alert.message}${alert.baselineSource === 'synthetic' ? ' (synthetic baseline)' : ''}`);
    }
    if (result.failures.length > 0) {
      console.log(`⚠️  ${result.failures.length} products failed: ${result.failures.map(f => f.productCode).join(', ')}`);
    }
    if (result.skippedProducts.length > 0) {
      console.log(`⏭️  ${result.skippedProducts.length} products skipped: ${result.skippedProducts.join(', ')}`);
    }
  }

  const reportPath = await reportWriter.write(result);
  console.log(`\n💾 Report written to ${reportPath}`);

  if (result.status === 'failed') {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigInvalidError) {
    console.error('❌ Invalid pipeline configuration:');
    error.issues.forEach(issue => console.error(`   - ${issue}`));
  } else {
    console.error('❌ Forecast run crashed:', getErrorMessage(error));
  }
  process.exit(1);
});
