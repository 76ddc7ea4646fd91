export { runMainLeg, runCellVoltageLeg, runCellTemperatureLeg } from './legs';
export { reduceSeries } from './helpers';
export type { ReducedSeries } from './helpers';
export type * from './types';
