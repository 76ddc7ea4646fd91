/**
 * Built-in firmware profiles
 *
 * `s3-default` matches the web panel as observed in the field: cell
 * voltages split after the first 72 cells, temperatures after the first 8
 * sensors. `s3-strict` splits both series in halves and additionally keeps
 * near-fence readings out of the reported min/max.
 */

import { validatePlanEntry } from '@core/decoder';
import { validateFence, validateReportFence } from '@core/sanitizer';
import type { FieldSpec } from '@core/decoder';
import type { FenceOverrides, FirmwareProfile, MainField, TopologyField } from './types';

const MAIN_PLAN: readonly FieldSpec<MainField>[] = [
  { name: 'voltage', skip: 1, kind: 'unsigned', scale: 1000 },
  { name: 'current', skip: 2, kind: 'integer', scale: 1 },
  { name: 'stateOfCharge', skip: 2, kind: 'unsigned', scale: 10 },
  { name: 'tempAvg', skip: 2, kind: 'integer', scale: 10 },
  { name: 'tempMin', skip: 2, kind: 'integer', scale: 10 },
  { name: 'tempMax', skip: 2, kind: 'integer', scale: 10 },
  { name: 'tempMaster', skip: 2, kind: 'integer', scale: 10 },
];

const TOPOLOGY_PLAN: readonly FieldSpec<TopologyField>[] = [
  { name: 'slaves', skip: 0, kind: 'unsigned', scale: 1 },
  { name: 'cells', skip: 0, kind: 'unsigned', scale: 1 },
  { name: 'cellsPerSlave', skip: 0, kind: 'unsigned', scale: 1 },
  { name: 'tempSensors', skip: 0, kind: 'unsigned', scale: 1 },
  { name: 'safetyResistors', skip: 0, kind: 'unsigned', scale: 1 },
];

export const S3_DEFAULT: FirmwareProfile = {
  name: 's3-default',
  main: {
    resource: 'main_data.shtml',
    key: 'Parametersatz',
    plan: MAIN_PLAN,
  },
  cellVoltage: {
    resource: 'ucell.shtml',
    topologyKey: 'PSet0',
    topologyPlan: TOPOLOGY_PLAN,
    seriesKey: 'PSet',
    series: { name: 'cellVoltage', skip: 2, kind: 'unsigned', scale: 1 },
    partition: { kind: 'fixed', at: 72 },
    policy: { fence: { lo: 3000, hi: 4200 } },
  },
  cellTemperature: {
    resource: 'tcell.shtml',
    key: 'PSet',
    series: { name: 'cellTemperature', skip: 1, kind: 'integer', scale: 10 },
    partition: { kind: 'fixed', at: 8 },
    policy: { fence: { lo: 15, hi: 45 } },
  },
};

export const S3_STRICT: FirmwareProfile = {
  name: 's3-strict',
  main: S3_DEFAULT.main,
  cellVoltage: {
    ...S3_DEFAULT.cellVoltage,
    partition: { kind: 'halves' },
    policy: {
      fence: { lo: 3000, hi: 4200 },
      reportFence: { minAbove: 3690, maxBelow: 4210 },
    },
  },
  cellTemperature: {
    ...S3_DEFAULT.cellTemperature,
    partition: { kind: 'halves' },
    policy: {
      fence: { lo: 15, hi: 45 },
      reportFence: { minAbove: 15, maxBelow: 45 },
    },
  },
};

const PROFILES: readonly FirmwareProfile[] = [S3_DEFAULT, S3_STRICT];

export const DEFAULT_PROFILE_NAME = S3_DEFAULT.name;

/**
 * Names of the built-in profiles
 */
export function listProfiles(): string[] {
  return PROFILES.map((profile) => profile.name);
}

/**
 * Look up a built-in profile by name
 * @param name - Profile name
 * @returns The profile
 * @throws {Error} If no profile has that name
 */
export function getProfile(name: string): FirmwareProfile {
  const profile = PROFILES.find((candidate) => candidate.name === name);
  if (!profile) {
    throw new Error('Unknown firmware profile "' + name + '" (known: ' + listProfiles().join(', ') + ')');
  }
  return profile;
}

/**
 * Derive a profile with operator-supplied replacement fences
 *
 * Report fences are left untouched: the two are independent tunables.
 *
 * @param profile - Base profile
 * @param overrides - Fences to replace
 * @returns New profile; the base is not modified
 * @throws {Error} If an override fence is inverted
 */
export function withFences(profile: FirmwareProfile, overrides: FenceOverrides): FirmwareProfile {
  const voltageFence = overrides.voltage ?? profile.cellVoltage.policy.fence;
  const temperatureFence = overrides.temperature ?? profile.cellTemperature.policy.fence;
  validateFence(voltageFence, 'voltage');
  validateFence(temperatureFence, 'temperature');

  return {
    ...profile,
    cellVoltage: {
      ...profile.cellVoltage,
      policy: { ...profile.cellVoltage.policy, fence: voltageFence },
    },
    cellTemperature: {
      ...profile.cellTemperature,
      policy: { ...profile.cellTemperature.policy, fence: temperatureFence },
    },
  };
}

/**
 * Check a profile's plans and fences before it is used for a cycle
 * @throws {Error} Describing the first inconsistent entry
 */
export function validateProfile(profile: FirmwareProfile): void {
  for (const spec of profile.main.plan) {
    validatePlanEntry(spec.name, spec.skip, spec.scale);
  }
  for (const spec of profile.cellVoltage.topologyPlan) {
    validatePlanEntry(spec.name, spec.skip, spec.scale);
  }

  const series = [profile.cellVoltage, profile.cellTemperature];
  for (const endpoint of series) {
    validatePlanEntry(endpoint.series.name, endpoint.series.skip, endpoint.series.scale);
    validateFence(endpoint.policy.fence, profile.name + '/' + endpoint.series.name);
    if (endpoint.policy.reportFence) {
      validateReportFence(endpoint.policy.reportFence, profile.name + '/' + endpoint.series.name);
    }
    if (endpoint.partition.kind === 'fixed' && (!Number.isInteger(endpoint.partition.at) || endpoint.partition.at < 0)) {
      throw new Error(profile.name + '/' + endpoint.series.name + ': partition index must be a non-negative integer');
    }
  }
}
