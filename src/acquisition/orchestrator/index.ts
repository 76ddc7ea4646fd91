export { startAcquisition, fetchSnapshot } from './orchestrator';
export { toAcquisitionError, deepFreeze } from './helpers';
export type * from './types';
