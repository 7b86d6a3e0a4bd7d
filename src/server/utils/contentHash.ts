import crypto from 'crypto';

/**
 * Compute a stable document identifier from the fields that define a document's identity
 *
 * Two raw documents with the same source and content collapse to the same ID, which keeps
 * re-storing a document idempotent.
 *
 * @param source Publisher or feed the document came from
 * @param content Raw document text
 * @returns SHA-256 hash of the document identity
 */
export function computeDocumentId(source: string, content: string): string {
  const contentString = `${(source || '').trim()}|${(content || '').trim()}`;
  return crypto.createHash('sha256').update(contentString, 'utf8').digest('hex');
}
