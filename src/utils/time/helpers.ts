/**
 * Time formatting helpers
 */

/**
 * Left-pad a number with zeros to two digits
 */
function pad2(value: number): string {
  return value < 10 ? '0' + value : String(value);
}

/**
 * Format an epoch-millisecond timestamp as local "YYYY-MM-DD HH:MM:SS"
 * @param ms - Epoch milliseconds
 * @returns Formatted local date and time
 */
export function formatTimestamp(ms: number): string {
  const d = new Date(ms);
  return d.getFullYear() + '-' + pad2(d.getMonth() + 1) + '-' + pad2(d.getDate()) +
    ' ' + pad2(d.getHours()) + ':' + pad2(d.getMinutes()) + ':' + pad2(d.getSeconds());
}

/**
 * Format a duration in milliseconds with one decimal place
 * @param ms - Duration in milliseconds
 * @returns e.g. "1100.0"
 */
export function formatElapsedMs(ms: number): string {
  return ms.toFixed(1);
}

/**
 * Milliseconds elapsed since a reference timestamp
 *
 * A reference in the future (clock stepped backwards) yields 0 so that
 * timeout checks never see a negative silence.
 *
 * @param fromMs - Reference timestamp
 * @param nowMs - Current timestamp
 * @returns Non-negative elapsed milliseconds
 */
export function elapsedSince(fromMs: number, nowMs: number): number {
  const dt = nowMs - fromMs;
  return dt > 0 ? dt : 0;
}
