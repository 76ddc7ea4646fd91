/**
 * Firmware profile type definitions
 *
 * A profile pins down everything that depends on the controller firmware:
 * which pages to fetch, which script variable carries the data, the
 * positional decode plans, how series split into groups and the fences
 * used when sanitizing.
 */

import type { FieldSpec, SeriesSpec } from '@core/decoder';
import type { SanitizePolicy } from '@core/sanitizer';
import type { Partition } from '@core/statistics';
import type { Fence } from '$types/common';

/**
 * Pack-level fields on the main panel page
 */
export type MainField =
  | 'voltage'
  | 'current'
  | 'stateOfCharge'
  | 'tempAvg'
  | 'tempMin'
  | 'tempMax'
  | 'tempMaster';

/**
 * Topology fields on the cell voltage page
 */
export type TopologyField =
  | 'slaves'
  | 'cells'
  | 'cellsPerSlave'
  | 'tempSensors'
  | 'safetyResistors';

export interface MainEndpoint {
  resource: string;
  key: string;
  plan: readonly FieldSpec<MainField>[];
}

export interface CellVoltageEndpoint {
  resource: string;
  topologyKey: string;
  topologyPlan: readonly FieldSpec<TopologyField>[];
  seriesKey: string;
  series: SeriesSpec;
  partition: Partition;
  policy: SanitizePolicy;
}

export interface CellTemperatureEndpoint {
  resource: string;
  key: string;
  series: SeriesSpec;
  partition: Partition;
  policy: SanitizePolicy;
}

/**
 * Complete description of one controller firmware
 */
export interface FirmwareProfile {
  name: string;
  main: MainEndpoint;
  cellVoltage: CellVoltageEndpoint;
  cellTemperature: CellTemperatureEndpoint;
}

/**
 * Operator overrides for the replacement fences
 */
export interface FenceOverrides {
  voltage?: Fence;
  temperature?: Fence;
}
