/**
 * Watchdog trigger actions
 *
 * Adapters between an external action dispatcher and the watchdog. Input is
 * validated here; the watchdog only ever sees well-typed arguments.
 */

import { describeError } from '../types/errors';
import { parseFeedParam, parseStopParam } from './params';

import type { Logger } from '../logging/types';
import type { Watchdog } from '../watchdog/types';
import type { ActionResult, WatchdogActions } from './types';

/**
 * Short printable form of a raw parameter
 * @param param - Raw trigger parameter
 * @returns Text for debug logs
 */
function describeParam(param: unknown): string {
  if (typeof param === 'string') {
    return JSON.stringify(param) + ' (string)';
  }
  if (param === undefined) {
    return 'undefined';
  }
  return JSON.stringify(param) + ' (' + (Array.isArray(param) ? 'array' : typeof param) + ')';
}

/**
 * Create the feed and stop actions for a watchdog
 *
 * @param watchdog - Watchdog the actions drive
 * @param logger - Diagnostics logger
 * @returns Action handlers returning { success }
 */
export function createWatchdogActions(watchdog: Watchdog, logger: Logger): WatchdogActions {
  function feed(param: unknown): ActionResult {
    logger.debug('Watchdog feed action param: ' + describeParam(param));

    const parsed = parseFeedParam(param);
    if (!parsed.ok) {
      logger.debug('Watchdog feed action rejected: ' + parsed.error);
      return { success: false };
    }

    try {
      return { success: watchdog.feed(parsed.value.timeoutMs, parsed.value.info) };
    } catch (err) {
      logger.debug('Watchdog feed action exception: ' + describeError(err));
      return { success: false };
    }
  }

  function stop(param: unknown): ActionResult {
    logger.debug('Watchdog stop action param: ' + describeParam(param));

    try {
      return { success: watchdog.manualStop(parseStopParam(param)) };
    } catch (err) {
      logger.debug('Watchdog stop action exception: ' + describeError(err));
      return { success: false };
    }
  }

  return {
    feed: feed,
    stop: stop
  };
}
