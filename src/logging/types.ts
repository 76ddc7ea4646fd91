/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces
 * - Filter context
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 * Passed to pure functions instead of importing config
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

/**
 * Level names accepted from configuration and the command line
 */
export type LogLevelName = 'debug' | 'info' | 'warning' | 'critical';

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  getLevel(): LogLevel;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
  /** Hours after which INFO logs are suppressed (0 to disable) */
  demoteHours: number;
}

/**
 * Sink with its minimum log level
 */
export interface SinkWithLevel {
  sink: LogSink;
  /** Minimum level this sink receives */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Function returning current time in seconds */
  timeSource: () => number;
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Output sink; level filtering happens in the logger before write() is called
 */
export interface LogSink {
  /** Write a formatted line; the level is passed so sinks can style or route it */
  write(formattedMessage: string, level: LogLevel): void;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Colorize level tags with ANSI escapes */
  colors: boolean;
  /** Route WARNING and CRITICAL to stderr, keeping stdout for data */
  errorsToStderr: boolean;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  log(message: string): void;
  error(message: string): void;
}

// ═══════════════════════════════════════════════════════════════
// FILTER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Context for log filtering decisions
 */
export interface FilterContext {
  currentLevel: LogLevel;
  /** Logger uptime in seconds */
  uptime: number;
  demoteHours: number;
}
