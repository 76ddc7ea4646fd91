/**
 * Validation helper functions
 * Reusable checks that append to error and warning lists instead of throwing
 */

import { isFiniteNumber, isInteger } from '@utils/number';
import type { Fence } from '$types/common';
import type { ValidationError, ValidationWarning } from './types';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// TYPE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value is a boolean
 */
export function validateBoolean(value: unknown, field: string, errors: ValidationError[]): void {
  if (typeof value !== 'boolean') {
    addError(errors, field, `${field} must be a boolean (got ${typeof value})`);
  }
}

/**
 * Validate that a value is a non-blank string
 */
export function validateNonEmptyString(value: unknown, field: string, errors: ValidationError[]): void {
  if (typeof value !== 'string' || value.trim() === '') {
    addError(errors, field, `${field} must be a non-empty string`);
  }
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against critical and recommended ranges
 *
 * Critical range violations produce errors, recommended range violations
 * produce warnings. The recommended range is only checked when both its
 * bounds are given and the critical check passed.
 *
 * @param value - Value to validate
 * @param field - Field name for messages
 * @param criticalMin - Hard lower limit
 * @param criticalMax - Hard upper limit
 * @param errors - Error list (appended)
 * @param warnings - Warning list (appended)
 * @param recommendedMin - Soft lower limit
 * @param recommendedMax - Soft upper limit
 */
export function validateNumberRange(
  value: number,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (!isFiniteNumber(value) || value < criticalMin || value > criticalMax) {
    addError(errors, field, `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`);
    return;
  }

  if (recommendedMin !== undefined && recommendedMax !== undefined &&
      (value < recommendedMin || value > recommendedMax)) {
    addWarning(
      warnings,
      field,
      `${field} is outside recommended range ${recommendedMin}-${recommendedMax} (got ${value})`
    );
  }
}

/**
 * Validate an integer against critical and recommended ranges
 * @see validateNumberRange
 */
export function validateIntegerRange(
  value: number,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return;
  }

  validateNumberRange(value, field, criticalMin, criticalMax, errors, warnings, recommendedMin, recommendedMax);
}

/**
 * Validate an optional fence override (null means "use the profile's")
 */
export function validateFenceOverride(fence: Fence | null, field: string, errors: ValidationError[]): void {
  if (fence === null) return;

  if (!isFiniteNumber(fence.lo) || !isFiniteNumber(fence.hi)) {
    addError(errors, field, `${field} bounds must be finite numbers (got ${fence.lo}..${fence.hi})`);
    return;
  }
  if (fence.lo > fence.hi) {
    addError(errors, field, `${field} lower bound ${fence.lo} exceeds upper bound ${fence.hi}`);
  }
}
