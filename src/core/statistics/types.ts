/**
 * Statistics aggregator type definitions
 */

/**
 * How a sample array is split into the right/left groups
 * - none: overall only
 * - fixed: first `at` samples vs the remainder
 * - halves: first floor(n/2) samples vs the remainder
 */
export type Partition =
  | { kind: 'none' }
  | { kind: 'fixed'; at: number }
  | { kind: 'halves' };

/**
 * Result of a single reduction pass
 */
export interface SeriesStats {
  avg: number;
  min: number;
  max: number;
  delta: number;
}
