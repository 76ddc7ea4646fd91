export { validateConfig } from './validator';
export {
  addError,
  addWarning,
  validateBoolean,
  validateNonEmptyString,
  validateNumberRange,
  validateIntegerRange,
  validateFenceOverride
} from './helpers';
export type * from './types';
