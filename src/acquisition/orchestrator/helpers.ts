/**
 * Orchestrator helper functions
 */

import { BmsError, FetchFailedError, UnexpectedFailureError } from '$types/errors';
import type { AcquisitionError, LegName } from '$types';

/**
 * Classify a leg rejection
 *
 * Typed pipeline failures become FetchFailedError; anything else is a
 * defect and becomes UnexpectedFailureError.
 *
 * @param leg - Leg that rejected
 * @param reason - Rejection value
 */
export function toAcquisitionError(leg: LegName, reason: unknown): AcquisitionError {
  if (reason instanceof BmsError) {
    return new FetchFailedError(leg, reason);
  }
  return new UnexpectedFailureError(leg, reason);
}

/**
 * Freeze an object graph (MUTABLE: freezes the given value in place)
 * @returns The same value, now frozen at every level
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }

  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}
