/**
 * Alert message builders
 *
 * Every alert starts with a "[WATCHDOG]" tag line followed by blank-line
 * separated fields.
 */

import { formatElapsedMs, formatTimestamp } from '../utils/time';

/**
 * Join a tag and its fields into one alert body
 * @param tag - First line
 * @param fields - "Label: value" lines
 * @returns Alert text
 */
function compose(tag: string, fields: string[]): string {
  return [tag].concat(fields).join('\n\n');
}

/**
 * Alert sent when the first feed arms the watchdog
 * @param timeoutMs - Threshold in effect
 * @param info - Context given with the feed
 * @param at - Epoch ms of arming
 * @returns Alert text
 */
export function buildStartMessage(timeoutMs: number, info: string, at: number): string {
  return compose('[WATCHDOG] Auto-Started', [
    'Timeout: ' + timeoutMs + 'ms',
    'Info: ' + info,
    'Time: ' + formatTimestamp(at)
  ]);
}

/**
 * Alert sent when a feed changes the threshold of a running watchdog
 * @param oldTimeoutMs - Threshold before the feed
 * @param newTimeoutMs - Threshold after the feed
 * @param info - Context given with the feed
 * @param at - Epoch ms of the feed
 * @returns Alert text
 */
export function buildUpdateMessage(oldTimeoutMs: number, newTimeoutMs: number, info: string, at: number): string {
  return compose('[WATCHDOG] Timeout Updated', [
    'Old Timeout: ' + oldTimeoutMs + 'ms',
    'New Timeout: ' + newTimeoutMs + 'ms',
    'Info: ' + info,
    'Time: ' + formatTimestamp(at)
  ]);
}

/**
 * Alert sent when the watchdog stops
 * @param reason - "Timeout occurred" or "Manual stop - <info>"
 * @param at - Epoch ms of the stop
 * @returns Alert text
 */
export function buildStopMessage(reason: string, at: number): string {
  return compose('[WATCHDOG] Auto-Stopped', [
    'Reason: ' + reason,
    'Time: ' + formatTimestamp(at)
  ]);
}

export interface TimeoutAlertDetails {
  startInfo: string;
  timeoutMs: number;
  elapsedMs: number;
  /** Null when the watchdog was never fed */
  lastFeedTime: number | null;
  alertTime: number;
}

/**
 * Alert sent when a timeout is reported
 * @param details - Values substituted into the alert
 * @returns Alert text
 */
export function buildTimeoutMessage(details: TimeoutAlertDetails): string {
  return compose('[WATCHDOG] Timeout Alert!', [
    'Start Info: ' + details.startInfo,
    'Timeout Threshold: ' + details.timeoutMs + 'ms',
    'Elapsed Time: ' + formatElapsedMs(details.elapsedMs) + 'ms',
    'Last Feed: ' + (details.lastFeedTime === null ? 'Never' : formatTimestamp(details.lastFeedTime)),
    'Alert Time: ' + formatTimestamp(details.alertTime)
  ]);
}
