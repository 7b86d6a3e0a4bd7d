/**
 * Static Signal Source
 *
 * ExternalSignalSource backed by a fixed document list, loaded from memory or from a JSON
 * fixture. Stands in for market-data integrations (agency reports, news wires) until a
 * live source is wired in.
 */

import { readFile } from 'fs/promises';
import type { CallOptions, ExternalSignalSource, RawDocument } from '../../contracts/types.js';
import { RunCancelledError, SourceUnavailableError } from '../../types/errors.js';
import { formatIssues, rawDocumentListSchema } from '../../validation/pipelineSchemas.js';

export class StaticSignalSource implements ExternalSignalSource {
  readonly name: string;
  private readonly documents: readonly RawDocument[];

  constructor(documents: readonly RawDocument[], name: string = 'static') {
    this.documents = documents;
    this.name = name;
  }

  async fetch(options: CallOptions = {}): Promise<RawDocument[]> {
    if (options.signal?.aborted) {
      throw new RunCancelledError(`${this.name}.fetch`);
    }
    return this.documents.map(doc => ({ ...doc, publishedAt: new Date(doc.publishedAt.getTime()) }));
  }

  /**
   * Load documents from a JSON array of `{ source, content, publishedAt, category }`
   *
   * @throws {SourceUnavailableError} when the file cannot be read or does not validate
   */
  static async fromFile(filePath: string, name: string = filePath): Promise<StaticSignalSource> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(filePath, 'utf8'));
    } catch (error) {
      throw new SourceUnavailableError(name, `cannot read signal file ${filePath}`, { cause: error });
    }

    const parsed = rawDocumentListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SourceUnavailableError(name, `invalid signal file ${filePath}`, {
        context: { issues: formatIssues(parsed.error) },
      });
    }
    return new StaticSignalSource(parsed.data, name);
  }
}
