/**
 * Statistics aggregator
 *
 * Reduces cell voltages and temperatures into {avg, min, max, delta} in a
 * single pass with constant extra memory. Voltages are integer mV and their
 * average truncates; temperatures are °C and divide exactly.
 *
 * An optional report fence narrows which samples may become the reported
 * min/max (see the sanitizer): the average always covers every sample.
 */

import { EmptySeriesError } from '$types/errors';
import type { IndexRange, ReportFence, SeriesMode } from '$types/common';
import type { PartitionedStats, TempStats, VoltageStats } from '$types/snapshot';
import { resolveSplitIndex, validateRange } from './helpers';
import type { Partition, SeriesStats } from './types';

/**
 * Reduce a (sub)range of samples
 *
 * @param samples - Ordered samples
 * @param mode - Averaging mode
 * @param range - Half-open index range; whole series if omitted
 * @param reportFence - Secondary fence for min/max; plain bounds are kept if it leaves no ordered pair
 * @returns Aggregated statistics
 * @throws {EmptySeriesError} If the range holds no samples
 */
export function aggregate(
  samples: readonly number[],
  mode: SeriesMode,
  range?: IndexRange,
  reportFence?: ReportFence
): SeriesStats {
  const bounds = range ?? { start: 0, end: samples.length };
  validateRange(bounds, samples.length);

  if (bounds.end === bounds.start) {
    throw new EmptySeriesError(mode);
  }

  let min = Infinity;
  let max = -Infinity;
  let fencedMin = Infinity;
  let fencedMax = -Infinity;
  let sum = 0;

  for (let i = bounds.start; i < bounds.end; i++) {
    const v = samples[i];
    if (v < min) min = v;
    if (v > max) max = v;
    if (reportFence) {
      if (v > reportFence.minAbove && v < fencedMin) fencedMin = v;
      if (v < reportFence.maxBelow && v > fencedMax) fencedMax = v;
    }
    sum += v;
  }

  // Fenced bounds only replace the plain ones when both exist and stay ordered
  if (reportFence && fencedMin !== Infinity && fencedMax !== -Infinity && fencedMin <= fencedMax) {
    min = fencedMin;
    max = fencedMax;
  }

  const count = bounds.end - bounds.start;
  const avg = mode === 'voltage' ? Math.floor(sum / count) : sum / count;

  return {
    avg: avg,
    min: min,
    max: max,
    delta: max - min
  };
}

/**
 * Reduce cell voltages (mV)
 * @throws {EmptySeriesError} If the range holds no samples
 */
export function computeVoltageStats(
  samples: readonly number[],
  range?: IndexRange,
  reportFence?: ReportFence
): VoltageStats {
  return aggregate(samples, 'voltage', range, reportFence);
}

/**
 * Reduce cell temperatures (°C)
 * @throws {EmptySeriesError} If the range holds no samples
 */
export function computeTemperatureStats(
  samples: readonly number[],
  range?: IndexRange,
  reportFence?: ReportFence
): TempStats {
  return aggregate(samples, 'temperature', range, reportFence);
}

/**
 * Compute overall and partition statistics
 *
 * When the partition yields two non-empty groups, `right` covers the first
 * group and `left` the remainder, and the overall bounds are the union of
 * both groups. The overall average always covers the whole series.
 *
 * @param samples - Ordered samples
 * @param mode - Averaging mode
 * @param partition - Partition rule
 * @param reportFence - Optional secondary fence for min/max
 * @returns Overall statistics plus partitions (null when absent)
 * @throws {EmptySeriesError} If there are no samples
 */
export function computePartitionedStats(
  samples: readonly number[],
  mode: SeriesMode,
  partition: Partition,
  reportFence?: ReportFence
): PartitionedStats<SeriesStats> {
  const whole = aggregate(samples, mode, undefined, reportFence);
  const at = resolveSplitIndex(partition, samples.length);

  if (at === null) {
    return { overall: whole, left: null, right: null };
  }

  const right = aggregate(samples, mode, { start: 0, end: at }, reportFence);
  const left = aggregate(samples, mode, { start: at, end: samples.length }, reportFence);

  const min = Math.min(left.min, right.min);
  const max = Math.max(left.max, right.max);

  return {
    overall: {
      avg: whole.avg,
      min: min,
      max: max,
      delta: max - min
    },
    left: left,
    right: right
  };
}
