export { createPoller } from './poller';
export type * from './types';
