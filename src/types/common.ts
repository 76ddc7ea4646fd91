/**
 * Common type definitions used throughout the project
 */

/**
 * Independent fetch-decode-aggregate pipelines run per poll cycle
 */
export type LegName = 'main' | 'cell-voltage' | 'cell-temperature';

/**
 * Leg order used when joining; the first failing leg in this order is reported
 */
export const LEG_ORDER: readonly LegName[] = ['main', 'cell-voltage', 'cell-temperature'];

/**
 * Inclusive plausibility range; samples strictly outside are outliers
 */
export interface Fence {
  lo: number;
  hi: number;
}

/**
 * Secondary fence for reporting min/max after sanitization.
 * Min only considers samples strictly above `minAbove`,
 * max only samples strictly below `maxBelow`.
 */
export interface ReportFence {
  minAbove: number;
  maxBelow: number;
}

/**
 * Half-open index range [start, end)
 */
export interface IndexRange {
  start: number;
  end: number;
}

/**
 * Averaging mode: voltages are integer mV and truncate, temperatures divide exactly
 */
export type SeriesMode = 'voltage' | 'temperature';
