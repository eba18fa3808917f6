/**
 * Command-line helpers
 *
 * Parsing and formatting for the CLI. Output is plain text; main.ts adds
 * color.
 */

import { InvalidArgumentError } from 'commander';

import { describeAttempt } from '../notifications/helpers';
import { elapsedSince, formatElapsedMs, formatTimestamp } from '../utils/time';

import type { WatchdogActions } from '../host/types';
import type { DispatchReport } from '../notifications/types';
import type { ValidationResult } from '../validation/types';
import type { WatchdogSnapshot } from '../watchdog/types';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * One line of stdin in `run` mode
 */
export type CliCommand =
  | { kind: 'feed'; param: string | undefined }
  | { kind: 'stop'; param: string | undefined }
  | { kind: 'status' }
  | { kind: 'empty' }
  | { kind: 'unknown'; name: string };

/**
 * Line of CLI output; ok=false lines are shown as failures
 */
export interface OutputLine {
  ok: boolean;
  text: string;
}

// ═══════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════

/**
 * Parse the --interval option
 * @param value - Raw option value
 * @returns Interval in milliseconds
 * @throws {InvalidArgumentError} If value is not a positive integer
 */
export function parseIntervalOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer number of milliseconds.');
  }
  return parsed;
}

/**
 * Parse one command line
 *
 * The first word is the command; the rest of the line, if any, is passed
 * to the action verbatim (plain info text or JSON).
 *
 * @param line - Line read from stdin
 * @returns Parsed command
 */
export function parseCommandLine(line: string): CliCommand {
  const trimmed = line.trim();
  if (trimmed === '') {
    return { kind: 'empty' };
  }

  const space = trimmed.search(/\s/);
  const name = (space === -1 ? trimmed : trimmed.substring(0, space)).toLowerCase();
  const param = space === -1 ? undefined : trimmed.substring(space + 1).trim();

  switch (name) {
    case 'feed':
      return { kind: 'feed', param: param };
    case 'stop':
      return { kind: 'stop', param: param };
    case 'status':
      return { kind: 'status' };
    default:
      return { kind: 'unknown', name: name };
  }
}

// ═══════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════

/**
 * Run one stdin command against the watchdog
 *
 * @param command - Parsed command
 * @param actions - Feed and stop actions
 * @param status - Returns the current status line
 * @returns Output line, or null for blank input
 */
export function executeCommand(
  command: CliCommand,
  actions: WatchdogActions,
  status: () => string
): OutputLine | null {
  switch (command.kind) {
    case 'empty':
      return null;
    case 'feed': {
      const result = actions.feed(command.param);
      return { ok: result.success, text: result.success ? 'fed' : 'feed rejected' };
    }
    case 'stop': {
      const result = actions.stop(command.param);
      return { ok: result.success, text: result.success ? 'stopped' : 'not running' };
    }
    case 'status':
      return { ok: true, text: status() };
    case 'unknown':
      return { ok: false, text: 'Unknown command: ' + command.name + ' (expected feed, stop, status)' };
  }
}

// ═══════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════

/**
 * One-line watchdog status
 * @param snapshot - Watchdog state
 * @param now - Current epoch ms
 * @returns Status text
 */
export function formatStatus(snapshot: WatchdogSnapshot, now: number): string {
  if (!snapshot.running || snapshot.lastFeedTime === null) {
    return 'idle | timeout: ' + snapshot.timeoutMs + 'ms';
  }

  return 'running | timeout: ' + snapshot.timeoutMs + 'ms' +
    ' | last feed: ' + formatTimestamp(snapshot.lastFeedTime) +
    ' (' + formatElapsedMs(elapsedSince(snapshot.lastFeedTime, now)) + 'ms ago)' +
    ' | info: ' + snapshot.startInfo +
    ' | timeout signaled: ' + (snapshot.timeoutOccurred ? 'yes' : 'no');
}

/**
 * Message sent by `send-test` when none is given
 * @param now - Current epoch ms
 * @returns Message text
 */
export function buildTestMessage(now: number): string {
  return '[WATCHDOG] Test Message\n\nTime: ' + formatTimestamp(now);
}

/**
 * Lines describing a dispatch
 * @param report - Router report
 * @returns One line per attempt and a summary line
 */
export function formatDispatchReport(report: DispatchReport): OutputLine[] {
  const lines: OutputLine[] = report.attempts.map(function(attempt) {
    return { ok: attempt.ok, text: describeAttempt(attempt) };
  });

  if (report.attempts.length === 0) {
    lines.push({ ok: false, text: 'No notification channel is enabled' });
  }
  lines.push(report.channel === null
    ? { ok: false, text: 'Not delivered' }
    : { ok: true, text: 'Delivered via ' + report.channel });

  return lines;
}

/**
 * Lines describing a validation result
 * @param result - Validation result
 * @returns Errors, then warnings, then a summary line
 */
export function formatValidation(result: ValidationResult): OutputLine[] {
  const lines: OutputLine[] = [];

  result.errors.forEach(function(err) {
    lines.push({ ok: false, text: 'error   [' + err.field + ']: ' + err.message });
  });
  result.warnings.forEach(function(warn) {
    lines.push({ ok: true, text: 'warning [' + warn.field + ']: ' + warn.message });
  });
  lines.push(result.valid
    ? { ok: true, text: 'Configuration is valid' }
    : { ok: false, text: 'Configuration is invalid' });

  return lines;
}
