/**
 * Main logger coordinator
 *
 * Combines filtering, formatting and output sinks. Each message is checked
 * against the current level and the INFO auto-demotion rule, formatted with
 * a level tag, and written to every sink whose minimum level it meets.
 */

import { formatLogMessage, shouldLog } from './helpers';
import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * @param config - Logger configuration (level, demoteHours)
 * @param dependencies - External dependencies (timeSource, sinks)
 * @param logLevels - Log level constants object
 * @returns Logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 24 },
 *   {
 *     timeSource: () => Date.now() / 1000,
 *     sinks: [{ sink: createConsoleSink(console, { colors: true, errorsToStderr: true }), minLevel: LOG_LEVELS.DEBUG }]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.warning('Cell voltage page failed to decode');
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const demoteHours = config.demoteHours;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks;
  const startTime = timeSource();

  function log(level: LogLevel, msg: string): void {
    const context = {
      currentLevel: currentLevel,
      uptime: timeSource() - startTime,
      demoteHours: demoteHours
    };
    if (!shouldLog(level, context, logLevels)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, logLevels);

    for (let i = 0; i < sinks.length; i++) {
      if (level < sinks[i].minLevel) {
        continue;
      }

      try {
        sinks[i].sink.write(formattedMessage, level);
      } catch (err: unknown) {
        // A failing sink must not take the others down with it
        console.error('Logger sink error: ' + String(err));
      }
    }
  }

  function debug(msg: string): void {
    log(logLevels.DEBUG, msg);
  }

  function info(msg: string): void {
    log(logLevels.INFO, msg);
  }

  function warning(msg: string): void {
    log(logLevels.WARNING, msg);
  }

  function critical(msg: string): void {
    log(logLevels.CRITICAL, msg);
  }

  /**
   * Update log level at runtime
   */
  function setLevel(newLevel: LogLevel): void {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  return {
    log: log,
    debug: debug,
    info: info,
    warning: warning,
    critical: critical,
    setLevel: setLevel,
    getLevel: getLevel
  };
}
