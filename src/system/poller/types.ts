/**
 * Poll scheduler type definitions
 */

import type {
  AcquisitionDependencies,
  AcquisitionOptions,
  AcquisitionRequest
} from '@acquisition/orchestrator';
import type { FirmwareProfile } from '@acquisition/profiles';
import type { Logger } from '@logging';
import type { EndpointFetcher } from '@transport/http-fetcher';
import type { AcquisitionError } from '$types';
import type { Snapshot } from '$types/snapshot';

/**
 * Poller settings
 */
export interface PollerConfig {
  address: string;
  sanitize: boolean;
  profile: FirmwareProfile;

  /** A new cycle starts once this much time has passed since the last start */
  pollRateMs: number;

  /** Drop a cycle still in flight after this long (0 = never) */
  abandonAfterMs: number;

  /** Per-request HTTP timeout (0 = none) */
  requestTimeoutMs: number;
}

/**
 * Settings that may change between cycles
 */
export type PollerSettings = Partial<Pick<PollerConfig, 'address' | 'sanitize' | 'pollRateMs'>>;

export type StartAcquisition = (
  options: AcquisitionOptions,
  dependencies: AcquisitionDependencies
) => AcquisitionRequest;

/**
 * Poller collaborators
 */
export interface PollerDependencies {
  /** Cycle launcher; the orchestrator when omitted */
  start?: StartAcquisition;

  /** Page source handed to every cycle; an HTTP client per cycle when omitted */
  fetcher?: EndpointFetcher;

  logger?: Logger;

  /** Called with each new snapshot */
  onSnapshot?: (snapshot: Snapshot) => void;

  /** Called with each failed cycle's error */
  onError?: (error: AcquisitionError) => void;
}

/**
 * Counters and latest results
 */
export interface PollerStatus {
  /** Latest snapshot; kept when later cycles fail */
  snapshot: Snapshot | null;

  /** Error of the latest harvested cycle; cleared by a success */
  error: AcquisitionError | null;

  inFlight: boolean;
  started: number;
  succeeded: number;
  failed: number;
  abandoned: number;
}

export interface Poller {
  /**
   * Advance the scheduler: harvest a finished cycle, abandon a stalled one,
   * or start a new one when the poll interval has elapsed. Never waits for
   * the network.
   * @param nowMs - Current time in epoch milliseconds
   * @throws {Error} If a cycle cannot be launched (bad address or profile);
   *   counted as failed, and the next attempt waits for the poll interval
   */
  tick(nowMs: number): Promise<void>;

  getSnapshot(): Snapshot | null;
  getError(): AcquisitionError | null;
  getStatus(): PollerStatus;

  /** Change address, sanitization or rate; applies from the next cycle */
  configure(settings: PollerSettings): void;
}
