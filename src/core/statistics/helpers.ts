/**
 * Statistics helper functions
 */

import type { IndexRange } from '$types/common';
import type { Partition } from './types';

/**
 * Validate an index range against a series length
 * @throws {Error} If the range lies outside the series or is reversed
 */
export function validateRange(range: IndexRange, length: number): void {
  if (!Number.isInteger(range.start) || !Number.isInteger(range.end)) {
    throw new Error("Range bounds must be integers, got [" + range.start + ", " + range.end + ")");
  }
  if (range.start < 0 || range.end > length || range.start > range.end) {
    throw new Error("Range [" + range.start + ", " + range.end + ") is outside series of length " + length);
  }
}

/**
 * Resolve a partition into the index where the second group starts
 * @param partition - Partition rule
 * @param length - Series length
 * @returns Split index, or null when the series yields no two non-empty groups
 */
export function resolveSplitIndex(partition: Partition, length: number): number | null {
  let at: number | null = null;
  if (partition.kind === 'fixed') at = partition.at;
  if (partition.kind === 'halves') at = Math.floor(length / 2);

  if (at === null || at <= 0 || at >= length) {
    return null;
  }
  return at;
}
