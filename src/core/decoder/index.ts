export { decodeRecord, decodeSeries } from './decoder';
export { parseField, splitFields, validatePlanEntry } from './helpers';
export type * from './types';
