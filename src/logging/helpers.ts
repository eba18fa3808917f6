/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels } from './types';

/**
 * Level names accepted by parseLogLevel (case-insensitive)
 */
const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: 0,
  info: 1,
  warn: 2,
  warning: 2,
  critical: 3,
  error: 3,
};

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = '[DEBUG]    ';
  if (level === logLevels.INFO) tag = 'ℹ️ [INFO]     ';
  if (level === logLevels.WARNING) tag = '⚠️ [WARNING]  ';
  if (level === logLevels.CRITICAL) tag = '🚨 [CRITICAL] ';

  return tag + msg;
}

/**
 * Check if message should be logged at the current level
 * @param level - Log level to check
 * @param currentLevel - Current minimum level
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, currentLevel: LogLevel): boolean {
  return level >= currentLevel;
}

/**
 * Parse a level name such as "info" or "WARNING"
 * @param name - Level name (undefined when unset)
 * @param fallback - Level used for unset or unknown names
 * @returns Parsed log level
 */
export function parseLogLevel(name: string | undefined, fallback: LogLevel): LogLevel {
  if (name === undefined) {
    return fallback;
  }
  const level = LEVEL_NAMES[name.trim().toLowerCase()];
  return level === undefined ? fallback : level;
}

/**
 * Narrow a configured number to a log level
 * @param value - Numeric level from configuration
 * @returns The level, clamped into 0..3
 */
export function toLogLevel(value: number): LogLevel {
  if (value <= 0) return 0;
  if (value === 1) return 1;
  if (value === 2) return 2;
  return 3;
}
