/**
 * Sanitizer helper functions
 */

import type { Fence, ReportFence } from '$types/common';
import { isFiniteNumber } from '@utils/number';

/**
 * Validate a replacement fence
 * @throws {Error} If the bounds are not finite or are reversed
 */
export function validateFence(fence: Fence, context: string): void {
  if (!isFiniteNumber(fence.lo) || !isFiniteNumber(fence.hi)) {
    throw new Error(context + ": fence bounds must be finite numbers, got [" + fence.lo + ", " + fence.hi + "]");
  }
  if (fence.lo > fence.hi) {
    throw new Error(context + ": fence lower bound " + fence.lo + " exceeds upper bound " + fence.hi);
  }
}

/**
 * Validate a report fence
 * @throws {Error} If the bounds are not finite or leave no open interval
 */
export function validateReportFence(fence: ReportFence, context: string): void {
  if (!isFiniteNumber(fence.minAbove) || !isFiniteNumber(fence.maxBelow)) {
    throw new Error(context + ": report fence bounds must be finite numbers");
  }
  if (fence.minAbove >= fence.maxBelow) {
    throw new Error(
      context + ": report fence minAbove (" + fence.minAbove + ") must be below maxBelow (" + fence.maxBelow + ")"
    );
  }
}

/**
 * Check whether a sample lies inside the inclusive fence
 * @param value - Sample
 * @param fence - Inclusive plausibility range
 * @returns True if lo <= value <= hi
 */
export function isInsideFence(value: number, fence: Fence): boolean {
  return value >= fence.lo && value <= fence.hi;
}
