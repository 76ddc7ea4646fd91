/**
 * Acquisition orchestrator type definitions
 */

import type { FirmwareProfile } from '@acquisition/profiles';
import type { Logger } from '@logging';
import type { EndpointFetcher } from '@transport/http-fetcher';
import type { AcquisitionError, LegName } from '$types';
import type { Snapshot } from '$types/snapshot';

/**
 * Lifecycle of a request; a request starts with its legs already in flight
 */
export type AcquisitionState = 'in-flight' | 'complete' | 'failed';

/**
 * Settlement of a single leg
 */
export type LegStatus = 'pending' | 'fulfilled' | 'rejected';

/**
 * What to acquire
 */
export interface AcquisitionOptions {
  /** Controller address (`host`, `host:port` or URL) */
  address: string;

  /** Replace implausible samples before aggregation */
  sanitize: boolean;

  /** Firmware profile; the default profile when omitted */
  profile?: FirmwareProfile;

  /** Per-request HTTP timeout for the default client (0 = none) */
  timeoutMs?: number;
}

/**
 * Injected collaborators
 */
export interface AcquisitionDependencies {
  /** Page source; an HTTP client for `options.address` when omitted */
  fetcher?: EndpointFetcher;

  logger?: Logger;

  /** Clock for `acquiredAt` (epoch ms) */
  now?: () => number;
}

/**
 * Outcome of joining a request
 */
export type AcquisitionResult =
  | { ok: true; snapshot: Snapshot }
  | { ok: false; error: AcquisitionError };

/**
 * Handle for one poll cycle's three concurrent legs
 */
export interface AcquisitionRequest {
  /** Address the cycle reads from */
  readonly address: string;

  /** True once every leg has settled; never blocks */
  isFinished(): boolean;

  state(): AcquisitionState;

  /** Per-leg settlement, for diagnostics */
  legStatus(leg: LegName): LegStatus;

  /**
   * Wait for every leg and assemble the snapshot or report the first failure
   * in leg order. Consumes the request.
   * @throws {RequestConsumedError} On a second call
   */
  join(): Promise<AcquisitionResult>;
}
