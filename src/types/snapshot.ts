/**
 * Snapshot data model
 *
 * Produced by one successful poll cycle and consumed read-only by the
 * rendering layer. A snapshot is frozen on construction and replaces the
 * previous one wholesale.
 */

/**
 * Pack-level scalars from the main panel page
 */
export interface MainReading {
  /** Pack voltage (V) */
  voltage: number;

  /** Pack current, unscaled controller unit (mA on observed firmware) */
  current: number;

  /** State of charge (%) */
  stateOfCharge: number;

  /** Average cell temperature (°C) */
  tempAvg: number;

  /** Minimum cell temperature (°C) */
  tempMin: number;

  /** Maximum cell temperature (°C) */
  tempMax: number;

  /** Master controller temperature (°C) */
  tempMaster: number;
}

/**
 * Reduced statistics over cell voltages, all in mV
 */
export interface VoltageStats {
  avg: number;
  min: number;
  max: number;
  delta: number;
}

/**
 * Reduced statistics over cell temperatures, all in °C
 */
export interface TempStats {
  avg: number;
  min: number;
  max: number;
  delta: number;
}

/**
 * Controller topology reported alongside the cell voltages
 */
export interface Topology {
  slaves: number;
  cells: number;
  cellsPerSlave: number;
  tempSensors: number;
  safetyResistors: number;
}

/**
 * Statistics groups: `right` covers the first partition, `left` the remainder.
 * Partitions are absent when the profile defines none or the array is too short.
 */
export interface PartitionedStats<S> {
  overall: S;
  left: S | null;
  right: S | null;
}

/**
 * Per-cell voltages (mV, physical cell order) with topology and statistics
 */
export interface CellVoltageReport {
  topology: Topology;
  cells: readonly number[];
  stats: PartitionedStats<VoltageStats>;

  /** Indices replaced by the sanitizer (empty when nothing was replaced) */
  replaced: readonly number[];

  /** Value used for replacement, null when sanitization was off */
  replacement: number | null;
}

/**
 * Per-sensor temperatures (°C, sensor order) with statistics
 */
export interface CellTemperatureReport {
  sensors: readonly number[];
  stats: PartitionedStats<TempStats>;
  replaced: readonly number[];
  replacement: number | null;
}

/**
 * Complete, immutable result of one successful poll cycle
 */
export interface Snapshot {
  address: string;
  profile: string;
  sanitized: boolean;

  /** Epoch milliseconds when the cycle was joined */
  acquiredAt: number;

  main: MainReading;
  cellVoltage: CellVoltageReport;
  cellTemperature: CellTemperatureReport;
}
