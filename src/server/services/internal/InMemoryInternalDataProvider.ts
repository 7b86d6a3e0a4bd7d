/**
 * In-memory InternalDataProvider
 *
 * Serves sales history, inventory and production plans from a map keyed by product code,
 * optionally loaded from a JSON fixture. Unknown products reject with ProductNotFoundError.
 */

import { readFile } from 'fs/promises';
import type { CallOptions, InternalDataProvider, InternalProductData } from '../../contracts/types.js';
import { AppError, ErrorCode, ProductNotFoundError } from '../../types/errors.js';
import { formatIssues, internalDataFileSchema } from '../../validation/pipelineSchemas.js';

export class InMemoryInternalDataProvider implements InternalDataProvider {
  private readonly records: Map<string, InternalProductData>;

  constructor(records: Iterable<readonly [string, InternalProductData]> = []) {
    this.records = new Map(records);
  }

  async getHistory(productCode: string, _options?: CallOptions): Promise<InternalProductData> {
    const record = this.records.get(productCode);
    if (!record) {
      throw new ProductNotFoundError(productCode);
    }
    return record;
  }

  set(productCode: string, data: InternalProductData): void {
    this.records.set(productCode, data);
  }

  productCodes(): string[] {
    return [...this.records.keys()];
  }

  /**
   * Load records from a JSON object of `{ [productCode]: { historicalSales, inventoryLevel, productionPlans } }`
   *
   * @throws {AppError} when the file is unreadable or does not validate
   */
  static async fromFile(filePath: string): Promise<InMemoryInternalDataProvider> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(filePath, 'utf8'));
    } catch (error) {
      throw new AppError(`Cannot read internal data file ${filePath}`, ErrorCode.INTERNAL_ERROR, {
        context: { filePath },
        cause: error,
      });
    }

    const parsed = internalDataFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AppError(`Invalid internal data file ${filePath}`, ErrorCode.INTERNAL_ERROR, {
        context: { filePath, issues: formatIssues(parsed.error) },
      });
    }
    return new InMemoryInternalDataProvider(Object.entries(parsed.data));
  }
}
