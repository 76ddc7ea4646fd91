/**
 * Logging module barrel export
 *
 * - Logger coordinator (createLogger)
 * - Console sink with chalk-colored levels (createConsoleSink)
 * - Pure filter, format and level-parsing functions
 */

export { formatLogMessage, shouldLog, isLogLevelName, parseLogLevel } from './helpers';
export { createConsoleSink } from './console';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  LogLevelName,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  FilterContext
} from './types';
