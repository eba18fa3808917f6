/**
 * Shared fakes for unit tests
 */

import { createLogger } from '../logging/logger';

import type { Mock } from 'vitest';
import type { Logger, LogLevel, LogSink } from '../logging/types';

const LOG_LEVELS = { DEBUG: 0, INFO: 1, WARNING: 2, CRITICAL: 3 } as const;

export interface TestLogger {
  logger: Logger;
  write: Mock<LogSink['write']>;
  /** Lines written so far, without level tags */
  lines(): string[];
  /** Lines written at exactly this level, without level tags */
  linesAt(level: LogLevel): string[];
}

const TAG_PATTERN = /^(?:\S+ )?\[(?:DEBUG|INFO|WARNING|CRITICAL)\]\s+/u;

/**
 * Logger at DEBUG without timestamps, recording every line
 */
export function createTestLogger(): TestLogger {
  const write = vi.fn<LogSink['write']>();
  const logger = createLogger(
    { level: LOG_LEVELS.DEBUG, timestamps: false },
    { timeSource: () => 0, sinks: [{ sink: { write: write }, minLevel: LOG_LEVELS.DEBUG }] },
    LOG_LEVELS
  );

  function strip(line: string): string {
    return line.replace(TAG_PATTERN, '');
  }

  return {
    logger: logger,
    write: write,
    lines: () => write.mock.calls.map((call) => strip(call[0])),
    linesAt: (level) => write.mock.calls.filter((call) => call[1] === level).map((call) => strip(call[0]))
  };
}

export interface FakeClock {
  now(): number;
  set(ms: number): void;
  advance(ms: number): void;
}

/**
 * Manually driven clock
 * @param start - Initial epoch ms
 */
export function createFakeClock(start = 0): FakeClock {
  let current = start;
  return {
    now: () => current,
    set: (ms) => { current = ms; },
    advance: (ms) => { current += ms; }
  };
}
