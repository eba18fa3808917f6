/**
 * Console output sink
 *
 * Writes each line straight to the console API. WARNING and CRITICAL lines go
 * to stderr; with colors enabled DEBUG is dimmed, WARNING is yellow and
 * CRITICAL is red.
 */

import chalk from 'chalk';

import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI, LogLevel } from '../types';

/**
 * Apply the level color to a formatted line
 * @param line - Formatted log line
 * @param level - Level the line was logged at
 * @returns Colored line
 */
export function colorize(line: string, level: LogLevel): string {
  if (level === 0) return chalk.gray(line);
  if (level === 2) return chalk.yellow(line);
  if (level === 3) return chalk.red.bold(line);
  return line;
}

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { colors: true });
 * consoleSink.write('ℹ️ [INFO]     hello', 1);
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): ConsoleSink {
  let writeCount = 0;

  function write(formattedMessage: string, level: LogLevel): void {
    const line = config.colors ? colorize(formattedMessage, level) : formattedMessage;
    if (level >= 2) {
      consoleApi.error(line);
    } else {
      consoleApi.log(line);
    }
    writeCount++;
  }

  function getWriteCount(): number {
    return writeCount;
  }

  function initialize(callback: (success: boolean, message: string) => void): void {
    callback(true, 'Console sink initialized');
  }

  return {
    write: write,
    initialize: initialize,
    getWriteCount: getWriteCount
  };
}
