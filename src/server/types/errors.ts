/**
 * Centralized error type definitions for the forecasting pipeline
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Stage-level failures
  SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
  INDEX_UNAVAILABLE = 'INDEX_UNAVAILABLE',
  OPERATION_TIMEOUT = 'OPERATION_TIMEOUT',

  // Per-product failures
  PRODUCT_NOT_FOUND = 'PRODUCT_NOT_FOUND',
  INVALID_FORECAST = 'INVALID_FORECAST',
  BATCH_WORKER_FAILED = 'BATCH_WORKER_FAILED',

  // Rejected before the run starts
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Run-scoped signal aborted
  RUN_CANCELLED = 'RUN_CANCELLED',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    options: { isOperational?: boolean; retryable?: boolean; context?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The external signal source could not deliver documents. Aborts the run at INGESTING.
 */
export class SourceUnavailableError extends AppError {
  constructor(source: string, message: string, options: { context?: Record<string, unknown>; cause?: unknown } = {}) {
    super(`Signal source unavailable (${source}): ${message}`, ErrorCode.SOURCE_UNAVAILABLE, {
      context: { source, ...options.context },
      cause: options.cause,
    });
  }
}

/**
 * The document index could not be reached for a store or a query.
 */
export class IndexUnavailableError extends AppError {
  constructor(message: string, options: { context?: Record<string, unknown>; cause?: unknown } = {}) {
    super(`Document index unavailable: ${message}`, ErrorCode.INDEX_UNAVAILABLE, {
      retryable: true,
      context: options.context,
      cause: options.cause,
    });
  }
}

/**
 * An I/O call did not settle within its caller-supplied timeout.
 * Handled in the same failure class as {@link IndexUnavailableError}.
 */
export class OperationTimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, ErrorCode.OPERATION_TIMEOUT, {
      retryable: true,
      context: { operation, timeoutMs },
    });
  }
}

export class ProductNotFoundError extends AppError {
  constructor(productCode: string, context?: Record<string, unknown>) {
    super(`Internal data for product '${productCode}' not found`, ErrorCode.PRODUCT_NOT_FOUND, {
      context: { productCode, ...context },
    });
  }
}

/**
 * A forecast model produced a value that breaks `lower <= forecastUnits <= upper`
 * or a negative/non-integer unit count.
 */
export class InvalidForecastError extends AppError {
  constructor(productCode: string, reason: string, context?: Record<string, unknown>) {
    super(`Invalid forecast for product '${productCode}': ${reason}`, ErrorCode.INVALID_FORECAST, {
      context: { productCode, ...context },
    });
  }
}

export class ConfigInvalidError extends AppError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Pipeline configuration invalid:\n${issues.map(i => `  - ${i}`).join('\n')}`, ErrorCode.CONFIG_INVALID, {
      context: { issues },
    });
    this.issues = issues;
  }
}

/**
 * The run's AbortSignal fired. Never a stage failure: products not yet forecast are skipped.
 */
export class RunCancelledError extends AppError {
  constructor(operation: string, options: { cause?: unknown } = {}) {
    super(`${operation} cancelled`, ErrorCode.RUN_CANCELLED, {
      context: { operation },
      cause: options.cause,
    });
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Index outages and timeouts are retried; everything else fails on first sight
 */
export function isRetryablePipelineError(error: unknown): boolean {
  return isAppError(error) && error.retryable;
}

/**
 * Errors that fail a single product without touching its siblings
 */
export function isPerProductFailure(error: unknown): error is AppError {
  return (
    error instanceof IndexUnavailableError ||
    error instanceof OperationTimeoutError ||
    error instanceof ProductNotFoundError ||
    error instanceof InvalidForecastError
  );
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_ERROR, { isOperational: false, cause: error });
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_ERROR, { isOperational: false, context: { error } });
}

/**
 * Extract a loggable message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
