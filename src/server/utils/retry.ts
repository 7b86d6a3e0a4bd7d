/**
 * Retry Utility with Exponential Backoff
 *
 * Provides a centralized retry mechanism with exponential backoff for transient failures.
 * Supports configurable retry attempts, delays, and retryable error detection.
 */

import type { Logger } from 'pino';
import { logger as defaultLogger } from './logger.js';
import { getErrorMessage, isRetryablePipelineError } from '../types/errors.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts after the first try (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 500) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 5000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Function to determine if an error is retryable (default: index outages and timeouts) */
  isRetryable?: (error: unknown) => boolean;
  /** Stops retrying once aborted; the last error is rethrown */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<Pick<RetryConfig, 'maxAttempts' | 'initialDelay' | 'maxDelay' | 'multiplier'>> = {
  maxAttempts: 3,
  initialDelay: 500,
  maxDelay: 5000,
  multiplier: 2,
};

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Current attempt number (0-indexed)
 * @returns Delay in milliseconds
 */
export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry; receives the 0-indexed attempt number
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., operation name, product code)
 * @returns Result of the operation
 * @throws The last error if all retries are exhausted
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    isRetryable = isRetryablePipelineError,
    signal,
    logger = defaultLogger,
  } = config;

  const contextStr = context ? ` (${context})` : '';
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxAttempts; attempt++) {
    try {
      const result = await operation(attempt);

      if (attempt > 0) {
        logger.info(
          { attempt: attempt + 1, maxAttempts: maxAttempts + 1, context },
          `Operation succeeded after ${attempt} retry attempts${contextStr}`
        );
      }

      return result;
    } catch (error) {
      lastError = error;

      if (!isRetryable(error)) {
        logger.debug(
          { attempt: attempt + 1, maxAttempts: maxAttempts + 1, error: getErrorMessage(error), context },
          `Non-retryable error encountered${contextStr}`
        );
        throw error;
      }

      if (attempt >= maxAttempts || signal?.aborted) {
        logger.error(
          { attempt: attempt + 1, maxAttempts: maxAttempts + 1, error: getErrorMessage(error), context },
          `Operation failed after ${attempt + 1} attempts${contextStr}`
        );
        throw error;
      }

      const delay = calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);

      logger.warn(
        { attempt: attempt + 1, maxAttempts: maxAttempts + 1, delay, error: getErrorMessage(error), context },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts + 1})`
      );

      if (delay > 0) {
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  // Unreachable: the loop either returns or rethrows
  throw lastError;
}
