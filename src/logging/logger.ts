/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 * The logger routes messages through filters and formatters before writing to sinks.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Optional local timestamp prefix
 * - Multiple output sinks with per-sink minimum level
 * - Runtime level adjustment
 * - Callback-based sink initialization
 */

import { formatTimestamp } from '../utils/time/helpers';
import { formatLogMessage, shouldLog } from './helpers';

import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, InitMessage, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * Each message is:
 * 1. Checked against the current log level
 * 2. Formatted with a level-appropriate tag (and timestamp when enabled)
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration (level, timestamps)
 * @param dependencies - External dependencies (timeSource, sinks)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, timestamps: true },
 *   {
 *     timeSource: nowMs,
 *     sinks: [{ sink: consoleSink, minLevel: LOG_LEVELS.DEBUG }]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.info('Watchdog armed');
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks;

  function log(level: LogLevel, msg: string): void {
    if (!shouldLog(level, currentLevel)) {
      return;
    }

    let formattedMessage = formatLogMessage(level, msg, logLevels);
    if (config.timestamps) {
      formattedMessage = formatTimestamp(timeSource()) + ' ' + formattedMessage;
    }

    for (const entry of sinks) {
      if (level < entry.minLevel) {
        continue;
      }

      try {
        entry.sink.write(formattedMessage, level);
      } catch (err) {
        // Sink errors should not crash the logger
        console.warn('Logger sink error: ' + String(err));
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

  function setLevel(newLevel: LogLevel): void {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  /**
   * Initialize all sinks
   * @param callback - Called once with (success, messages[]) after every sink reported
   */
  function initialize(callback: (success: boolean, messages: InitMessage[]) => void): void {
    const messages: InitMessage[] = [];
    const pending = sinks.filter(function(entry) { return entry.sink.initialize !== undefined; });
    let completed = 0;

    if (pending.length === 0) {
      callback(true, messages);
      return;
    }

    for (const entry of pending) {
      entry.sink.initialize?.(function(success: boolean, message: string) {
        messages.push({ success: success, message: message });
        completed++;
        if (completed === pending.length) {
          callback(messages.every(function(m) { return m.success; }), messages);
        }
      });
    }
  }

  return {
    log: log,
    debug: debug,
    info: info,
    warning: warning,
    critical: critical,
    setLevel: setLevel,
    getLevel: getLevel,
    initialize: initialize
  };
}
