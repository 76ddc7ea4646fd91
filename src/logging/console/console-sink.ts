/**
 * Console output sink
 *
 * Writes formatted lines to the console with the level tag colorized by
 * chalk. WARNING and CRITICAL can be routed to stderr so piped snapshot
 * output on stdout stays clean.
 */

import { Chalk } from 'chalk';

import type { ConsoleAPI, ConsoleSinkConfig, LogLevel, LogSink } from '../types';

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration
 * @returns Console sink
 */
export function createConsoleSink(consoleApi: ConsoleAPI, config: ConsoleSinkConfig): LogSink {
  const chalk = new Chalk({ level: config.colors ? 1 : 0 });

  function paint(formattedMessage: string, level: LogLevel): string {
    switch (level) {
      case 0: return chalk.gray(formattedMessage);
      case 1: return chalk.cyan(formattedMessage);
      case 2: return chalk.yellow(formattedMessage);
      case 3: return chalk.red.bold(formattedMessage);
    }
  }

  function write(formattedMessage: string, level: LogLevel): void {
    const line = paint(formattedMessage, level);
    if (config.errorsToStderr && level >= 2) {
      consoleApi.error(line);
    } else {
      consoleApi.log(line);
    }
  }

  return {
    write: write
  };
}
