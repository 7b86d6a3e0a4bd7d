/**
 * Timeout utility for wrapping async operations
 *
 * Every suspension point of the pipeline (signal fetch, index store/query, internal data
 * lookup) goes through here with a caller-supplied timeout.
 */

import { OperationTimeoutError } from '../types/errors.js';

/**
 * Wrap a promise with a timeout
 *
 * @param promise - The promise to wrap
 * @param timeoutMs - Timeout in milliseconds; `undefined` or a non-positive value disables it
 * @param operationName - Name used in the timeout error
 * @returns The promise result or throws {@link OperationTimeoutError}
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  operationName: string = 'Operation'
): Promise<T> {
  if (timeoutMs === undefined || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new OperationTimeoutError(operationName, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Default timeout values for pipeline I/O (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /** External signal fetch - 30 seconds */
  SIGNAL_FETCH: 30000,
  /** Document index store/query - 10 seconds */
  INDEX_QUERY: 10000,
} as const;
