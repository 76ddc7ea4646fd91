export * from './common';
export * from './errors';
export type * from './snapshot';
export type * from './config';
