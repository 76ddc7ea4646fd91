/**
 * Leg helper functions
 */

import { sanitizeSeries } from '@core/sanitizer';
import { computePartitionedStats } from '@core/statistics';
import type { SanitizePolicy } from '@core/sanitizer';
import type { Partition, SeriesStats } from '@core/statistics';
import type { SeriesMode } from '$types/common';
import type { PartitionedStats } from '$types/snapshot';

/**
 * Reduced series ready for a report
 */
export interface ReducedSeries {
  samples: number[];
  stats: PartitionedStats<SeriesStats>;
  replaced: number[];
  replacement: number | null;
}

/**
 * Sanitize (optionally) and aggregate a decoded series
 *
 * Sanitization runs on the raw samples before any statistic is taken. The
 * report fence belongs to the sanitizing policy and is ignored when
 * sanitization is off.
 *
 * @param samples - Decoded series, taken over by this function
 * @param mode - Averaging mode
 * @param partition - Partition rule
 * @param policy - Fences for this series
 * @param sanitize - Whether sanitization is enabled for this cycle
 * @returns Final samples, statistics and sanitization record
 * @throws {EmptySeriesError} If the series is empty
 */
export function reduceSeries(
  samples: number[],
  mode: SeriesMode,
  partition: Partition,
  policy: SanitizePolicy,
  sanitize: boolean
): ReducedSeries {
  if (!sanitize) {
    return {
      samples: samples,
      stats: computePartitionedStats(samples, mode, partition),
      replaced: [],
      replacement: null
    };
  }

  const result = sanitizeSeries(samples, policy.fence, mode);

  return {
    samples: samples,
    stats: computePartitionedStats(samples, mode, partition, policy.reportFence),
    replaced: result.replaced,
    replacement: result.replacement
  };
}
