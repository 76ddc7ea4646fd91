/**
 * Type definitions for scraper configuration
 */

import type { LogLevel, LogLevels } from '@logging';
import type { Fence } from './common';

/**
 * User-configurable settings
 * Everything an operator might reasonably tune for polling, sanitization and logging
 */
export interface BmsUserConfig {
  // ───────── CONTROLLER ─────────
  readonly CONTROLLER_ADDRESS: string;
  readonly PROFILE: string;
  readonly REQUEST_TIMEOUT_MS: number;

  // ───────── POLLING ─────────
  readonly POLL_RATE_MS: number;
  readonly ABANDON_AFTER_MS: number;

  // ───────── SANITIZATION ─────────
  readonly SANITIZE: boolean;
  readonly VOLTAGE_FENCE: Fence | null;
  readonly TEMPERATURE_FENCE: Fence | null;

  // ───────── LOGGING ─────────
  readonly CONSOLE_COLORS: boolean;
  readonly GLOBAL_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Internal limits that should rarely change
 */
export interface BmsAppConstants {
  readonly LOG_LEVELS: LogLevels;

  // ───────── VALIDATION LIMITS ─────────
  readonly MIN_POLL_RATE_MS: number;
  readonly MAX_POLL_RATE_MS: number;
  readonly MAX_REQUEST_TIMEOUT_MS: number;
  readonly MAX_DEMOTE_HOURS: number;
}

/**
 * Complete configuration
 */
export type BmsConfig = BmsUserConfig & BmsAppConstants;
