export { sanitizeSeries, seriesAverage } from './sanitizer';
export { validateFence, validateReportFence, isInsideFence } from './helpers';
export type * from './types';
