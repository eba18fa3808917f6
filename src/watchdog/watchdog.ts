/**
 * Liveness watchdog
 *
 * Tracks whether a periodically reporting workload is still alive.
 *
 * ## Lifecycle
 * - Idle → Running on the first feed (arming)
 * - Running: every feed resets the timer; poll latches the first expiry
 * - Running → Idle on notify (auto-stop) or manualStop
 *
 * Every state operation is synchronous and runs to completion, so feeds,
 * polls and stops on one instance are totally ordered. Alerts are handed to
 * the alert sink and delivered outside the state operation that raised them.
 */

import { WatchdogValidationError } from '../types/errors';
import { isNonNegativeInteger } from '../utils/number';
import { elapsedSince, formatElapsedMs, formatTimestamp } from '../utils/time';
import { buildStartMessage, buildStopMessage, buildTimeoutMessage, buildUpdateMessage } from './messages';

import type { Watchdog, WatchdogDependencies, WatchdogOptions, WatchdogSnapshot, WatchdogState } from './types';

/**
 * Threshold applied when the arming feed carries none
 */
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Reject a threshold that is not a non-negative integer
 * @param value - Candidate threshold
 * @param context - Operation name for the message
 */
function assertTimeoutMs(value: number, context: string): void {
  if (!isNonNegativeInteger(value)) {
    throw new WatchdogValidationError(context + ': timeoutMs must be a non-negative integer, got ' + value);
  }
}

/**
 * Create a watchdog instance
 *
 * @param deps - Clock, alert sink and logger
 * @param options - Optional default threshold
 * @returns Watchdog owned by the caller
 * @throws {WatchdogValidationError} If options.defaultTimeoutMs is invalid
 *
 * @example
 * ```typescript
 * const watchdog = createWatchdog({ clock: nowMs, alerts: dispatcher, logger: logger });
 * watchdog.feed(60000, 'nightly import');
 * if (watchdog.poll()) {
 *   await watchdog.notify();
 * }
 * ```
 */
export function createWatchdog(deps: WatchdogDependencies, options: WatchdogOptions = {}): Watchdog {
  const clock = deps.clock;
  const alerts = deps.alerts;
  const logger = deps.logger;
  const defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;

  assertTimeoutMs(defaultTimeoutMs, 'createWatchdog');

  let state: WatchdogState = { running: false, timeoutMs: 0 };

  // ═══════════════════════════════════════════════════════════════
  // TRANSITIONS
  // ═══════════════════════════════════════════════════════════════

  function arm(timeoutMs: number, info: string, now: number): void {
    state = {
      running: true,
      timeoutMs: timeoutMs,
      lastFeedTime: now,
      startInfo: info,
      timeoutSignaled: false
    };

    logger.info('Watchdog auto-started - timeout: ' + timeoutMs + 'ms, info: ' + info);
    alerts.enqueue(buildStartMessage(timeoutMs, info, now));
  }

  function stop(reason: string, now: number): void {
    state = { running: false, timeoutMs: state.timeoutMs };

    logger.info('Watchdog auto-stopped - reason: ' + reason);
    alerts.enqueue(buildStopMessage(reason, now));
  }

  // ═══════════════════════════════════════════════════════════════
  // OPERATIONS
  // ═══════════════════════════════════════════════════════════════

  function feed(timeoutMs?: number, info: string = ''): boolean {
    if (timeoutMs !== undefined) {
      assertTimeoutMs(timeoutMs, 'feed');
    }

    const now = clock();

    if (!state.running) {
      const armTimeoutMs = timeoutMs ?? defaultTimeoutMs;
      logger.debug('Watchdog not running, auto-starting with timeout: ' + armTimeoutMs + 'ms, info: ' + info);
      arm(armTimeoutMs, info, now);
      return true;
    }

    state.lastFeedTime = now;
    state.timeoutSignaled = false;
    logger.debug('Watchdog fed at ' + formatTimestamp(now));

    if (timeoutMs !== undefined) {
      const oldTimeoutMs = state.timeoutMs;
      state.timeoutMs = timeoutMs;

      logger.info('Watchdog timeout updated - old: ' + oldTimeoutMs + 'ms, new: ' + timeoutMs + 'ms, info: ' + info);
      alerts.enqueue(buildUpdateMessage(oldTimeoutMs, timeoutMs, info, now));
    }

    return true;
  }

  function poll(): boolean {
    if (!state.running) {
      return false;
    }

    const elapsed = elapsedSince(state.lastFeedTime, clock());
    const isTimeout = elapsed > state.timeoutMs;

    if (isTimeout && !state.timeoutSignaled) {
      state.timeoutSignaled = true;
      logger.debug('Watchdog timeout detected - elapsed: ' + formatElapsedMs(elapsed) + 'ms, timeout: ' + state.timeoutMs + 'ms');
      return true;
    }

    logger.debug(
      'Watchdog poll - elapsed: ' + formatElapsedMs(elapsed) + 'ms, timeout: ' + state.timeoutMs +
      'ms, is_timeout: ' + isTimeout + ', already_processed: ' + state.timeoutSignaled
    );
    return false;
  }

  function notify(): Promise<boolean> {
    if (!state.running) {
      return Promise.resolve(false);
    }

    const now = clock();
    const elapsed = elapsedSince(state.lastFeedTime, now);
    const text = buildTimeoutMessage({
      startInfo: state.startInfo,
      timeoutMs: state.timeoutMs,
      elapsedMs: elapsed,
      lastFeedTime: state.lastFeedTime,
      alertTime: now
    });

    logger.info(
      'Watchdog timeout alert - elapsed: ' + formatElapsedMs(elapsed) + 'ms, threshold: ' + state.timeoutMs + 'ms, auto-stopping'
    );

    // Queued ahead of the stop alert, so delivery order matches
    const delivery = alerts.dispatch(text);
    stop('Timeout occurred', now);

    return delivery;
  }

  function manualStop(info: string = ''): boolean {
    if (!state.running) {
      logger.debug('Watchdog is not running');
      return false;
    }

    stop('Manual stop - ' + info, clock());
    return true;
  }

  // ═══════════════════════════════════════════════════════════════
  // ACCESSORS
  // ═══════════════════════════════════════════════════════════════

  function snapshot(): WatchdogSnapshot {
    if (!state.running) {
      return { running: false, timeoutMs: state.timeoutMs, lastFeedTime: null, startInfo: '', timeoutOccurred: false };
    }
    return {
      running: true,
      timeoutMs: state.timeoutMs,
      lastFeedTime: state.lastFeedTime,
      startInfo: state.startInfo,
      timeoutOccurred: state.timeoutSignaled
    };
  }

  return {
    feed: feed,
    poll: poll,
    notify: notify,
    manualStop: manualStop,
    isRunning: function() { return state.running; },
    timeoutOccurred: function() { return state.running && state.timeoutSignaled; },
    currentTimeoutMs: function() { return state.timeoutMs; },
    snapshot: snapshot
  };
}
