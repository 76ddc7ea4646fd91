export { ControllerHttpClient } from './http-fetcher';
export { normalizeBaseUrl, resourceUrl } from './helpers';
export type * from './types';
