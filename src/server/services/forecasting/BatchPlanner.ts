/**
 * Batch Planner
 *
 * Partitions the product codes of a run into disjoint, order-preserving batches, one per
 * concurrent worker. Batches 0..K-2 receive floor(N / K) consecutive codes and the last
 * batch absorbs the remainder, so no product is dropped when N is not divisible by K.
 */

import type { ProductBatch } from '../../contracts/types.js';
import { ConfigInvalidError } from '../../types/errors.js';

/**
 * Split product codes into at most `batchCount` batches
 *
 * - N = 0 yields no batches
 * - N < K yields N single-code batches (never an empty batch)
 * - otherwise exactly K batches, the last one holding the remainder
 *
 * @throws {ConfigInvalidError} when batchCount is not a positive integer
 */
export function planBatches(productCodes: readonly string[], batchCount: number): ProductBatch[] {
  if (!Number.isInteger(batchCount) || batchCount <= 0) {
    throw new ConfigInvalidError([`batchCount: Must be a positive integer, got ${batchCount}`]);
  }

  const total = productCodes.length;
  if (total === 0) {
    return [];
  }

  const actualBatchCount = Math.min(batchCount, total);
  const batchSize = Math.max(1, Math.floor(total / batchCount));

  const batches: ProductBatch[] = [];
  for (let i = 0; i < actualBatchCount; i++) {
    const start = i * batchSize;
    const end = i === actualBatchCount - 1 ? total : start + batchSize;
    batches.push(productCodes.slice(start, end));
  }
  return batches;
}
