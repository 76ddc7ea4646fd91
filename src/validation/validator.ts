/**
 * Configuration validator
 *
 * Checks a merged configuration before the poller starts. Hard limits are
 * errors; settings that work but are likely unintended are warnings.
 */

import { listProfiles } from '@acquisition/profiles';
import { normalizeBaseUrl } from '@transport/http-fetcher';
import type { BmsConfig } from '$types/config';
import {
  addError,
  addWarning,
  validateBoolean,
  validateFenceOverride,
  validateIntegerRange,
  validateNonEmptyString
} from './helpers';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';

export function validateConfig(config: BmsConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // Controller
  validateNonEmptyString(config.CONTROLLER_ADDRESS, 'CONTROLLER_ADDRESS', errors);
  if (config.CONTROLLER_ADDRESS.trim() !== '') {
    try {
      normalizeBaseUrl(config.CONTROLLER_ADDRESS);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      addError(errors, 'CONTROLLER_ADDRESS', 'CONTROLLER_ADDRESS rejected: ' + reason);
    }
  }
  if (!listProfiles().includes(config.PROFILE)) {
    addError(errors, 'PROFILE', `PROFILE must be one of ${listProfiles().join(', ')} (got ${config.PROFILE})`);
  }
  if (config.REQUEST_TIMEOUT_MS !== 0) {
    validateIntegerRange(config.REQUEST_TIMEOUT_MS, 'REQUEST_TIMEOUT_MS', 1, config.MAX_REQUEST_TIMEOUT_MS, errors, warnings);
  }

  // Polling
  validateIntegerRange(
    config.POLL_RATE_MS, 'POLL_RATE_MS',
    config.MIN_POLL_RATE_MS, config.MAX_POLL_RATE_MS,
    errors, warnings,
    500, 5000
  );
  validateIntegerRange(config.ABANDON_AFTER_MS, 'ABANDON_AFTER_MS', 0, Number.MAX_SAFE_INTEGER, errors, warnings);
  if (config.ABANDON_AFTER_MS > 0 && config.ABANDON_AFTER_MS <= config.POLL_RATE_MS) {
    addWarning(
      warnings,
      'ABANDON_AFTER_MS',
      `ABANDON_AFTER_MS (${config.ABANDON_AFTER_MS}) is not above POLL_RATE_MS (${config.POLL_RATE_MS}); slow cycles will never complete`
    );
  }
  if (config.REQUEST_TIMEOUT_MS > 0 && config.ABANDON_AFTER_MS > 0 && config.REQUEST_TIMEOUT_MS >= config.ABANDON_AFTER_MS) {
    addWarning(warnings, 'REQUEST_TIMEOUT_MS', 'REQUEST_TIMEOUT_MS has no effect once it reaches ABANDON_AFTER_MS');
  }

  // Sanitization
  validateBoolean(config.SANITIZE, 'SANITIZE', errors);
  validateFenceOverride(config.VOLTAGE_FENCE, 'VOLTAGE_FENCE', errors);
  validateFenceOverride(config.TEMPERATURE_FENCE, 'TEMPERATURE_FENCE', errors);
  if (!config.SANITIZE && (config.VOLTAGE_FENCE !== null || config.TEMPERATURE_FENCE !== null)) {
    addWarning(warnings, 'SANITIZE', 'Fence overrides are ignored while SANITIZE is off');
  }

  // Logging
  validateBoolean(config.CONSOLE_COLORS, 'CONSOLE_COLORS', errors);
  validateIntegerRange(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', config.LOG_LEVELS.DEBUG, config.LOG_LEVELS.CRITICAL, errors, warnings);
  validateIntegerRange(
    config.GLOBAL_LOG_AUTO_DEMOTE_HOURS, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS',
    0, config.MAX_DEMOTE_HOURS,
    errors, warnings
  );

  return {
    valid: errors.length === 0,
    errors: errors,
    warnings: warnings
  };
}
