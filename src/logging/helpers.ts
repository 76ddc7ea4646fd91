/**
 * Logging helper functions
 */

import type { FilterContext, LogLevel, LogLevelName, LogLevels } from './types';

const LEVEL_NAMES: readonly LogLevelName[] = ['debug', 'info', 'warning', 'critical'];

/**
 * Format log message with level tag
 *
 * Tags are padded to a common width so messages line up:
 * `[DEBUG]    `, `[INFO]     `, `[WARNING]  `, `[CRITICAL] `
 *
 * @param level - Log level
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = '[DEBUG]    ';
  if (level === logLevels.INFO) tag = '[INFO]     ';
  if (level === logLevels.WARNING) tag = '[WARNING]  ';
  if (level === logLevels.CRITICAL) tag = '[CRITICAL] ';

  return tag + msg;
}

/**
 * Check if message should be logged based on level and auto-demotion
 *
 * INFO messages are suppressed once uptime exceeds demoteHours, unless the
 * logger runs at DEBUG or demotion is disabled (demoteHours = 0).
 *
 * @param level - Log level to check
 * @param context - Current level, uptime and demotion threshold
 * @param logLevels - Log level constants object
 * @returns True if message should be logged
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === logLevels.INFO &&
      context.currentLevel > logLevels.DEBUG &&
      context.demoteHours > 0 &&
      context.uptime > context.demoteHours * 3600) {
    return false;
  }

  return true;
}

/**
 * Check whether a string names a log level
 * @param value - Candidate name (case-insensitive)
 */
export function isLogLevelName(value: string): value is LogLevelName {
  return LEVEL_NAMES.some((name) => name === value);
}

/**
 * Resolve a level name to its numeric level
 * @param name - Level name, case-insensitive
 * @param logLevels - Log level constants object
 * @returns Numeric level
 * @throws {Error} If the name is not a known level
 */
export function parseLogLevel(name: string, logLevels: LogLevels): LogLevel {
  const normalized = name.trim().toLowerCase();
  if (!isLogLevelName(normalized)) {
    throw new Error('Unknown log level "' + name + '" (expected one of: ' + LEVEL_NAMES.join(', ') + ')');
  }

  switch (normalized) {
    case 'debug': return logLevels.DEBUG;
    case 'info': return logLevels.INFO;
    case 'warning': return logLevels.WARNING;
    case 'critical': return logLevels.CRITICAL;
  }
}
