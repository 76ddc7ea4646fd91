/**
 * Outlier sanitizer
 *
 * The controller's sensor bus occasionally reports saturated or zeroed values
 * on a dead cell tap. With sanitization enabled, every sample outside the
 * plausibility fence is replaced by the average of the raw series so min/max
 * stay meaningful for display. This is a display filter, not a correction:
 * operators can switch it off to see raw controller output.
 */

import { EmptySeriesError } from '$types/errors';
import type { Fence, SeriesMode } from '$types/common';
import { isInsideFence, validateFence } from './helpers';
import type { SanitizeResult } from './types';

/**
 * Average a whole series (truncated for voltages)
 * @throws {EmptySeriesError} If the series is empty
 */
export function seriesAverage(samples: readonly number[], mode: SeriesMode): number {
  if (samples.length === 0) {
    throw new EmptySeriesError(mode);
  }

  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    sum += samples[i];
  }

  return mode === 'voltage' ? Math.floor(sum / samples.length) : sum / samples.length;
}

/**
 * Replace out-of-fence samples with the raw average (MUTABLE)
 *
 * The average is taken over every raw sample before any replacement. Order
 * and length of the series are preserved.
 *
 * @param samples - Series to sanitize (mutated in place)
 * @param fence - Inclusive plausibility range
 * @param mode - Averaging mode
 * @returns Replacement value and replaced indices
 * @throws {EmptySeriesError} If the series is empty
 */
export function sanitizeSeries(samples: number[], fence: Fence, mode: SeriesMode): SanitizeResult {
  validateFence(fence, 'sanitizeSeries');
  const replacement = seriesAverage(samples, mode);
  const replaced: number[] = [];

  for (let i = 0; i < samples.length; i++) {
    if (!isInsideFence(samples[i], fence)) {
      samples[i] = replacement;
      replaced.push(i);
    }
  }

  return {
    replacement: replacement,
    replaced: replaced
  };
}
