/**
 * Acquisition orchestrator
 *
 * Launches the main, cell-voltage and cell-temperature legs concurrently and
 * hands back a request that can be polled without blocking and joined once.
 * A snapshot only exists when all three legs succeed; otherwise the first
 * failure in leg order is reported. Dropping an unjoined request simply
 * abandons its legs.
 */

import { DEFAULT_PROFILE_NAME, getProfile, validateProfile } from '@acquisition/profiles';
import { runCellTemperatureLeg, runCellVoltageLeg, runMainLeg } from '@acquisition/legs';
import { ControllerHttpClient } from '@transport/http-fetcher';
import { RequestConsumedError, UnexpectedFailureError } from '$types/errors';
import type { LegName } from '$types';
import type { Snapshot } from '$types/snapshot';
import { deepFreeze, toAcquisitionError } from './helpers';
import type {
  AcquisitionDependencies,
  AcquisitionOptions,
  AcquisitionRequest,
  AcquisitionResult,
  AcquisitionState,
  LegStatus
} from './types';

/**
 * Start one poll cycle
 *
 * @param options - Address, sanitization flag and profile
 * @param dependencies - Optional fetcher, logger and clock
 * @returns Request handle with the legs already in flight
 * @throws {Error} If the profile is inconsistent, or no fetcher is given and the address is not usable
 *
 * @example
 * ```typescript
 * const request = startAcquisition({ address: '192.168.0.200', sanitize: true });
 * // ... later, from a render or timer tick
 * if (request.isFinished()) {
 *   const result = await request.join();
 * }
 * ```
 */
export function startAcquisition(
  options: AcquisitionOptions,
  dependencies: AcquisitionDependencies = {}
): AcquisitionRequest {
  const profile = options.profile ?? getProfile(DEFAULT_PROFILE_NAME);
  validateProfile(profile);
  const fetcher = dependencies.fetcher ??
    new ControllerHttpClient({ address: options.address, timeoutMs: options.timeoutMs });
  const logger = dependencies.logger;
  const now = dependencies.now ?? Date.now;

  const status: Record<LegName, LegStatus> = {
    'main': 'pending',
    'cell-voltage': 'pending',
    'cell-temperature': 'pending'
  };
  let joined = false;

  function track<T>(leg: LegName, promise: Promise<T>): Promise<T> {
    void promise.then(
      () => { status[leg] = 'fulfilled'; },
      () => { status[leg] = 'rejected'; }
    );
    return promise;
  }

  const context = { fetcher: fetcher, profile: profile, sanitize: options.sanitize };
  logger?.debug('Acquisition started for ' + options.address + ' (profile ' + profile.name +
    ', sanitize ' + (options.sanitize ? 'on' : 'off') + ')');

  const mainLeg = track('main', runMainLeg(context));
  const voltageLeg = track('cell-voltage', runCellVoltageLeg(context));
  const temperatureLeg = track('cell-temperature', runCellTemperatureLeg(context));

  function isFinished(): boolean {
    return status['main'] !== 'pending' &&
      status['cell-voltage'] !== 'pending' &&
      status['cell-temperature'] !== 'pending';
  }

  function state(): AcquisitionState {
    if (!isFinished()) {
      return 'in-flight';
    }
    const anyRejected = status['main'] === 'rejected' ||
      status['cell-voltage'] === 'rejected' ||
      status['cell-temperature'] === 'rejected';
    return anyRejected ? 'failed' : 'complete';
  }

  function legStatus(leg: LegName): LegStatus {
    return status[leg];
  }

  function fail(leg: LegName, reason: unknown): AcquisitionResult {
    const error = toAcquisitionError(leg, reason);
    if (error instanceof UnexpectedFailureError) {
      logger?.critical(error.message);
    } else {
      logger?.warning(error.message);
    }
    return { ok: false, error: error };
  }

  async function join(): Promise<AcquisitionResult> {
    if (joined) {
      throw new RequestConsumedError();
    }
    joined = true;

    const [main, cellVoltage, cellTemperature] = await Promise.allSettled([mainLeg, voltageLeg, temperatureLeg]);

    if (main.status === 'rejected') return fail('main', main.reason);
    if (cellVoltage.status === 'rejected') return fail('cell-voltage', cellVoltage.reason);
    if (cellTemperature.status === 'rejected') return fail('cell-temperature', cellTemperature.reason);

    const snapshot: Snapshot = deepFreeze({
      address: options.address,
      profile: profile.name,
      sanitized: options.sanitize,
      acquiredAt: now(),
      main: main.value,
      cellVoltage: cellVoltage.value,
      cellTemperature: cellTemperature.value
    });

    logger?.debug('Acquisition complete for ' + options.address + ': ' +
      snapshot.cellVoltage.cells.length + ' cells, ' +
      snapshot.cellTemperature.sensors.length + ' sensors');

    return { ok: true, snapshot: snapshot };
  }

  return {
    address: options.address,
    isFinished: isFinished,
    state: state,
    legStatus: legStatus,
    join: join
  };
}

/**
 * Start a cycle against the HTTP controller with the default profile
 * @param address - Controller address
 * @param sanitize - Replace implausible samples
 */
export function fetchSnapshot(address: string, sanitize: boolean): AcquisitionRequest {
  return startAcquisition({ address: address, sanitize: sanitize });
}
