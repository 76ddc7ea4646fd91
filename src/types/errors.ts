/**
 * Global error types for the acquisition pipeline
 *
 * Every failure the pipeline can report is a subclass of BmsError, so callers
 * can tell "the controller or network misbehaved" apart from a plain Error
 * thrown by a defect in the pipeline itself.
 */

import type { LegName } from './common';

/**
 * Base error for all typed pipeline failures
 */
export class BmsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BmsError';
  }
}

/**
 * Connection, DNS, abort or non-2xx HTTP status while fetching a page
 */
export class TransportError extends BmsError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, status: number | null = null) {
    super(message);
    this.name = 'TransportError';
    this.url = url;
    this.status = status;
  }
}

/**
 * Response body was not valid UTF-8 text
 */
export class BodyDecodeError extends BmsError {
  readonly url: string;

  constructor(url: string, message: string) {
    super(message);
    this.name = 'BodyDecodeError';
    this.url = url;
  }
}

/**
 * Why an assignment could not be located in a document
 */
export type MalformedReason = 'missing' | 'ambiguous';

/**
 * Expected `key = "..."` assignment was absent or repeated.
 * Usually a firmware mismatch, a captive portal or a truncated page.
 */
export class MalformedDocumentError extends BmsError {
  readonly key: string;
  readonly reason: MalformedReason;

  constructor(key: string, reason: MalformedReason) {
    super(
      reason === 'missing'
        ? 'Document has no assignment for "' + key + '"'
        : 'Document has more than one assignment for "' + key + '"'
    );
    this.name = 'MalformedDocumentError';
    this.key = key;
    this.reason = reason;
  }
}

/**
 * Payload ran out of fields before the decode plan was satisfied
 */
export class FieldMissingError extends BmsError {
  readonly field: string;
  readonly position: number;

  constructor(field: string, position: number) {
    super('Field "' + field + '" missing at position ' + position);
    this.name = 'FieldMissingError';
    this.field = field;
    this.position = position;
  }
}

/**
 * A field did not parse as its declared numeric kind
 */
export class FieldUnparseableError extends BmsError {
  readonly field: string;
  readonly position: number;
  readonly raw: string;

  constructor(field: string, position: number, raw: string) {
    super('Field "' + field + '" at position ' + position + ' is not a valid number: "' + raw + '"');
    this.name = 'FieldUnparseableError';
    this.field = field;
    this.position = position;
    this.raw = raw;
  }
}

/**
 * Statistics or sanitization were asked to reduce zero samples
 */
export class EmptySeriesError extends BmsError {
  readonly series: string;

  constructor(series: string) {
    super('Cannot aggregate empty series "' + series + '"');
    this.name = 'EmptySeriesError';
    this.series = series;
  }
}

/**
 * A leg returned a typed failure; wraps the original error
 */
export class FetchFailedError extends BmsError {
  readonly leg: LegName;
  declare readonly cause: BmsError;

  constructor(leg: LegName, cause: BmsError) {
    super('Could not fetch ' + leg + ' data: ' + cause.message, { cause: cause });
    this.name = 'FetchFailedError';
    this.leg = leg;
  }
}

/**
 * A leg terminated with something other than a typed failure (a defect)
 */
export class UnexpectedFailureError extends BmsError {
  readonly leg: LegName;

  constructor(leg: LegName, cause: unknown) {
    super('Unexpected failure in ' + leg + ' leg: ' + describeCause(cause), { cause: cause });
    this.name = 'UnexpectedFailureError';
    this.leg = leg;
  }
}

/**
 * join() was called on a request that was already joined
 */
export class RequestConsumedError extends BmsError {
  constructor() {
    super('Acquisition request has already been joined');
    this.name = 'RequestConsumedError';
  }
}

/**
 * Error surfaced to collaborators by a failed poll cycle
 */
export type AcquisitionError = FetchFailedError | UnexpectedFailureError;

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.name + ': ' + cause.message;
  }
  return String(cause);
}
