import { afterEach, describe, it, expect, vi } from 'vitest';
import { ConfigInvalidError } from '../../types/errors.js';
import { resetEnvCache, validateEnv } from '../env.js';
import { DEFAULT_PIPELINE_CONFIG, getPipelineConfigFromEnv, resolvePipelineConfig } from '../pipelineConfig.js';

describe('resolvePipelineConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(resolvePipelineConfig()).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it('merges retry overrides field by field', () => {
    const config = resolvePipelineConfig({ batchCount: 3, retry: { maxAttempts: 0 } });

    expect(config.batchCount).toBe(3);
    expect(config.retry).toEqual({ maxAttempts: 0, initialDelay: 500, maxDelay: 5000, multiplier: 2 });
  });

  it.each([
    [{ batchCount: 0 }, 'batchCount'],
    [{ batchCount: 1.5 }, 'batchCount'],
    [{ alertThresholdPercent: -1 }, 'alertThresholdPercent'],
    [{ highSeverityThresholdPercent: 5 }, 'highSeverityThresholdPercent'],
  ])('rejects %o', (overrides, field) => {
    try {
      resolvePipelineConfig(overrides);
      expect.unreachable('resolvePipelineConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigInvalidError);
      if (error instanceof ConfigInvalidError) {
        expect(error.issues.some(issue => issue.startsWith(`${field}:`))).toBe(true);
      }
    }
  });
});

describe('getPipelineConfigFromEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnvCache();
  });

  it('reads forecast policy from the environment', () => {
    vi.stubEnv('FORECAST_BATCH_COUNT', '8');
    vi.stubEnv('FORECAST_ALERT_THRESHOLD_PERCENT', '15');
    vi.stubEnv('FORECAST_HIGH_SEVERITY_THRESHOLD_PERCENT', '30');
    vi.stubEnv('PIPELINE_MAX_RETRIES', '1');
    vi.stubEnv('PIPELINE_RETRY_INITIAL_DELAY_MS', '250');
    resetEnvCache();

    const config = getPipelineConfigFromEnv();

    expect(config.batchCount).toBe(8);
    expect(config.alertThresholdPercent).toBe(15);
    expect(config.highSeverityThresholdPercent).toBe(30);
    expect(config.retry.maxAttempts).toBe(1);
    expect(config.retry.initialDelay).toBe(250);
  });

  it('rejects a high-severity threshold below the alert threshold', () => {
    vi.stubEnv('FORECAST_ALERT_THRESHOLD_PERCENT', '25');
    vi.stubEnv('FORECAST_HIGH_SEVERITY_THRESHOLD_PERCENT', '20');
    resetEnvCache();

    expect(() => validateEnv()).toThrow('FORECAST_HIGH_SEVERITY_THRESHOLD_PERCENT (20) cannot be lower than FORECAST_ALERT_THRESHOLD_PERCENT (25)');
  });
});
