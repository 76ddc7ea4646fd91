/**
 * Pattern extractor
 *
 * Controller pages are meant for a browser: the telemetry lives in a single
 * script assignment such as `Parametersatz = "0,48500,..."`. This module pulls
 * the quoted payload out of the page and nothing else.
 */

import { MalformedDocumentError } from '$types/errors';
import { getAssignmentPattern } from './helpers';

/**
 * Extract the quoted payload assigned to `key`
 *
 * @param document - Full response body
 * @param key - Assignment key expected exactly once
 * @returns The text between the quotes (may be empty)
 * @throws {MalformedDocumentError} If the key is absent or assigned more than once
 */
export function extractAssignment(document: string, key: string): string {
  const pattern = getAssignmentPattern(key);
  const matches = Array.from(document.matchAll(pattern));

  if (matches.length === 0) {
    throw new MalformedDocumentError(key, 'missing');
  }
  if (matches.length > 1) {
    throw new MalformedDocumentError(key, 'ambiguous');
  }

  return matches[0][1];
}
