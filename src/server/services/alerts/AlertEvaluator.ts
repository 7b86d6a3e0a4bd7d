/**
 * Alert Evaluator
 *
 * Compares each new forecast with the product's previous forecast and raises a DemandAlert
 * when the absolute percent change exceeds the alert threshold:
 *
 *   changePercent = (new - prior) / prior × 100      (prior = 0 -> 0, never alerts)
 *   alert     iff |changePercent| > alertThresholdPercent          (default 10)
 *   severity  = high iff |changePercent| > highSeverityThresholdPercent (default 20), else medium
 *
 * Products without a previous forecast are compared against a synthetic baseline of
 * forecastUnits × 0.9; those alerts are marked `baselineSource: 'synthetic'`.
 */

import type { Logger } from 'pino';
import type {
  AlertSeverity,
  AlertSummary,
  BaselineSource,
  DemandAlert,
  PriorForecastProvider,
  ProductForecast,
} from '../../contracts/types.js';
import { getErrorMessage } from '../../types/errors.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { roundTo } from '../../utils/numberUtils.js';
import { withTimeout } from '../../utils/withTimeout.js';

export const SYNTHETIC_BASELINE_FACTOR = 0.9;

export interface AlertEvaluatorOptions {
  alertThresholdPercent: number;
  highSeverityThresholdPercent: number;
  /** Timeout for each prior-forecast lookup */
  timeoutMs?: number;
}

export interface AlertEvaluation {
  alerts: DemandAlert[];
  alertSummary: AlertSummary;
}

/**
 * Percent change from `prior` to `current`; 0 when there is no usable baseline
 */
export function computeChangePercent(current: number, prior: number): number {
  if (prior === 0 || !Number.isFinite(prior)) {
    return 0;
  }
  return ((current - prior) / prior) * 100;
}

export function summarizeAlerts(alerts: readonly DemandAlert[]): AlertSummary {
  return {
    total: alerts.length,
    high: alerts.filter(alert => alert.severity === 'high').length,
    medium: alerts.filter(alert => alert.severity === 'medium').length,
  };
}

export class AlertEvaluator {
  constructor(
    private readonly priorForecasts: PriorForecastProvider,
    private readonly options: AlertEvaluatorOptions
  ) {}

  async evaluate(forecasts: readonly ProductForecast[], log: Logger = defaultLogger): Promise<AlertEvaluation> {
    const alerts: DemandAlert[] = [];

    for (const forecast of forecasts) {
      const { previousUnits, baselineSource } = await this.resolveBaseline(forecast, log);
      const alert = this.evaluateChange(forecast, previousUnits, baselineSource);
      if (alert) {
        alerts.push(alert);
      }
    }

    return { alerts, alertSummary: summarizeAlerts(alerts) };
  }

  /**
   * Alert for one product against a known baseline, or null when the change stays within threshold
   */
  evaluateChange(
    forecast: ProductForecast,
    previousUnits: number,
    baselineSource: BaselineSource = 'history'
  ): DemandAlert | null {
    const changePercent = computeChangePercent(forecast.forecastUnits, previousUnits);
    const magnitude = Math.abs(changePercent);

    if (magnitude <= this.options.alertThresholdPercent) {
      return null;
    }

    const severity: AlertSeverity = magnitude > this.options.highSeverityThresholdPercent ? 'high' : 'medium';

    return {
      productCode: forecast.productCode,
      changePercent: roundTo(changePercent, 2),
      severity,
      message: `Demand change of ${changePercent.toFixed(1)}% detected for ${forecast.productCode}`,
      forecastUnits: forecast.forecastUnits,
      previousUnits,
      baselineSource,
    };
  }

  private async resolveBaseline(
    forecast: ProductForecast,
    log: Logger
  ): Promise<{ previousUnits: number; baselineSource: BaselineSource }> {
    let previous: number | undefined;
    try {
      previous = await withTimeout(
        this.priorForecasts.getPrevious(forecast.productCode, { timeoutMs: this.options.timeoutMs }),
        this.options.timeoutMs,
        `getPrevious(${forecast.productCode})`
      );
    } catch (error) {
      log.warn(
        { productCode: forecast.productCode, error: getErrorMessage(error) },
        'Prior forecast lookup failed, using synthetic baseline'
      );
    }

    if (previous === undefined) {
      return {
        previousUnits: forecast.forecastUnits * SYNTHETIC_BASELINE_FACTOR,
        baselineSource: 'synthetic',
      };
    }
    return { previousUnits: previous, baselineSource: 'history' };
  }
}
