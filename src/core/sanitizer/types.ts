/**
 * Outlier sanitizer type definitions
 */

import type { Fence, ReportFence } from '$types/common';

/**
 * Sanitization policy for one series
 *
 * `fence` decides which samples get replaced; `reportFence`, when present,
 * decides which samples may become the reported min/max afterwards. The two
 * are independent tunables.
 */
export interface SanitizePolicy {
  fence: Fence;
  reportFence?: ReportFence;
}

/**
 * Outcome of sanitizing a series in place
 */
export interface SanitizeResult {
  /** Average of the raw samples, used as the replacement value */
  replacement: number;

  /** Indices that were replaced, ascending */
  replaced: number[];
}
