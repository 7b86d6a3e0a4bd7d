/**
 * Run Report Writer
 *
 * Persists a PipelineRunResult as `forecast-run-<runId>.json` and reads earlier reports
 * back, so the next run can use them as its prior-forecast baseline.
 */

import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import type { PipelineRunResult } from '../../contracts/types.js';
import { AppError, ErrorCode } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { formatIssues, runReportSchema, type RunReportSnapshot } from '../../validation/pipelineSchemas.js';

const REPORT_PREFIX = 'forecast-run-';
const REPORT_SUFFIX = '.json';

export function reportFileName(runId: string): string {
  return `${REPORT_PREFIX}${runId}${REPORT_SUFFIX}`;
}

export class RunReportWriter {
  constructor(private readonly reportDir: string) {}

  /**
   * Write the report and return its path. Dates serialize as ISO-8601 strings.
   */
  async write(result: PipelineRunResult): Promise<string> {
    await mkdir(this.reportDir, { recursive: true });
    const filePath = path.join(this.reportDir, reportFileName(result.runId));
    await writeFile(filePath, `${JSON.stringify(result, null, 2)}\n`, 'utf8');

    logger.info({ runId: result.runId, filePath }, 'Run report written');
    return filePath;
  }

  /**
   * Most recent report in the directory by `generatedAt`, or undefined when there is none.
   * Reports of failed runs carry no forecasts and are skipped.
   */
  async findLatest(): Promise<RunReportSnapshot | undefined> {
    let entries: string[];
    try {
      entries = await readdir(this.reportDir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }

    let latest: RunReportSnapshot | undefined;
    for (const entry of entries) {
      if (!entry.startsWith(REPORT_PREFIX) || !entry.endsWith(REPORT_SUFFIX)) {
        continue;
      }
      const report = await loadRunReport(path.join(this.reportDir, entry));
      if (report.status === 'failed') {
        continue;
      }
      if (!latest || report.generatedAt.getTime() > latest.generatedAt.getTime()) {
        latest = report;
      }
    }
    return latest;
  }
}

/**
 * Read a report written by {@link RunReportWriter}
 *
 * @throws {AppError} when the file is unreadable or not a run report
 */
export async function loadRunReport(filePath: string): Promise<RunReportSnapshot> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw new AppError(`Cannot read run report ${filePath}`, ErrorCode.INTERNAL_ERROR, {
      context: { filePath },
      cause: error,
    });
  }

  const parsed = runReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError(`Invalid run report ${filePath}`, ErrorCode.INTERNAL_ERROR, {
      context: { filePath, issues: formatIssues(parsed.error) },
    });
  }
  return parsed.data;
}
