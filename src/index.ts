/**
 * Public entry point
 *
 * Acquisition (`startAcquisition`, `fetchSnapshot`) and the poll scheduler
 * are the usual way in; the pure pipeline stages are exported for callers
 * that bring their own pages.
 */

export * from '@core/index';
export * from '@transport/http-fetcher';
export * from '@acquisition/profiles';
export * from '@acquisition/legs';
export * from '@acquisition/orchestrator';
export * from '@system/poller';
export * from '@logging';
export * from '@validation';
export * from '$types';
export { default as DEFAULT_CONFIG, USER_CONFIG, APP_CONSTANTS, LOG_LEVELS } from '@boot/config';
