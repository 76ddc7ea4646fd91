export {
  aggregate,
  computeVoltageStats,
  computeTemperatureStats,
  computePartitionedStats
} from './statistics';
export { resolveSplitIndex, validateRange } from './helpers';
export type * from './types';
