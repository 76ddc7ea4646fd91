/**
 * Poll scheduler
 *
 * Drives acquisition from a periodic tick (a render frame, a timer). At most
 * one cycle is in flight; a cycle is harvested on the first tick after it
 * finishes. A failed cycle keeps the previous snapshot on display next to
 * the new error.
 */

import { startAcquisition } from '@acquisition/orchestrator';
import type { AcquisitionRequest } from '@acquisition/orchestrator';
import type { AcquisitionError } from '$types';
import type { Snapshot } from '$types/snapshot';
import type { Poller, PollerConfig, PollerDependencies, PollerSettings, PollerStatus } from './types';

/**
 * Create a poll scheduler
 *
 * @param config - Poller settings
 * @param dependencies - Optional launcher, fetcher, logger and callbacks
 * @returns Poller
 *
 * @example
 * ```typescript
 * const poller = createPoller(
 *   { address: '192.168.0.200', sanitize: true, profile: S3_DEFAULT, pollRateMs: 2000, abandonAfterMs: 0, requestTimeoutMs: 0 },
 *   { onSnapshot: render }
 * );
 * setInterval(() => { poller.tick(Date.now()).catch(report); }, 100);
 * ```
 */
export function createPoller(config: PollerConfig, dependencies: PollerDependencies = {}): Poller {
  const start = dependencies.start ?? startAcquisition;
  const logger = dependencies.logger;

  let address = config.address;
  let sanitize = config.sanitize;
  let pollRateMs = config.pollRateMs;

  let current: AcquisitionRequest | null = null;
  let currentStartedAt = 0;
  let lastStartAt: number | null = null;

  let snapshot: Snapshot | null = null;
  let error: AcquisitionError | null = null;
  const counters = { started: 0, succeeded: 0, failed: 0, abandoned: 0 };

  async function harvest(request: AcquisitionRequest, nowMs: number): Promise<void> {
    const result = await request.join();

    if (result.ok) {
      snapshot = result.snapshot;
      error = null;
      counters.succeeded++;
      logger?.debug('Cycle for ' + request.address + ' harvested after ' + (nowMs - currentStartedAt) + 'ms');
      dependencies.onSnapshot?.(result.snapshot);
    } else {
      error = result.error;
      counters.failed++;
      dependencies.onError?.(result.error);
    }
  }

  function launch(nowMs: number): void {
    // A launch that throws still counts as this interval's attempt
    lastStartAt = nowMs;
    counters.started++;

    try {
      current = start(
        {
          address: address,
          sanitize: sanitize,
          profile: config.profile,
          timeoutMs: config.requestTimeoutMs
        },
        {
          fetcher: dependencies.fetcher,
          logger: logger
        }
      );
    } catch (launchError: unknown) {
      counters.failed++;
      throw launchError;
    }
    currentStartedAt = nowMs;
  }

  async function tick(nowMs: number): Promise<void> {
    const request = current;

    if (request !== null) {
      if (request.isFinished()) {
        current = null;
        await harvest(request, nowMs);
        return;
      }

      const age = nowMs - currentStartedAt;
      if (config.abandonAfterMs > 0 && age >= config.abandonAfterMs) {
        current = null;
        counters.abandoned++;
        logger?.warning('Abandoned cycle for ' + request.address + ' still in flight after ' + age + 'ms');
      }
      return;
    }

    if (lastStartAt === null || lastStartAt + pollRateMs < nowMs) {
      launch(nowMs);
    }
  }

  function configure(settings: PollerSettings): void {
    if (settings.address !== undefined) address = settings.address;
    if (settings.sanitize !== undefined) sanitize = settings.sanitize;
    if (settings.pollRateMs !== undefined) pollRateMs = settings.pollRateMs;
  }

  function getStatus(): PollerStatus {
    return {
      snapshot: snapshot,
      error: error,
      inFlight: current !== null,
      started: counters.started,
      succeeded: counters.succeeded,
      failed: counters.failed,
      abandoned: counters.abandoned
    };
  }

  return {
    tick: tick,
    getSnapshot: () => snapshot,
    getError: () => error,
    getStatus: getStatus,
    configure: configure
  };
}
