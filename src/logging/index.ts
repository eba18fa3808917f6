/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink (createConsoleSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, parseLogLevel, toLogLevel } from './helpers';
export { createConsoleSink, colorize } from './console/console-sink';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  InitMessage
} from './types';
