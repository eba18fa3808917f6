/**
 * Watchdog poller
 *
 * Recurring tick that checks the watchdog and reports a detected timeout.
 * Every tick polls, even while an earlier timeout alert is still being
 * delivered, so detection latency is bounded by the tick interval.
 */

import { describeError } from '../types/errors';

import type { Logger } from '../logging/types';
import type { Watchdog } from '../watchdog/types';
import type { PollerConfig, TimerAPI, WatchdogPoller } from './types';

/**
 * Create a poller for a watchdog
 *
 * @param watchdog - Watchdog to check
 * @param timer - Timer service
 * @param config - Tick interval
 * @param logger - Diagnostics logger
 * @returns Poller (not yet started)
 *
 * @example
 * ```typescript
 * const poller = createWatchdogPoller(watchdog, createNodeTimerApi(), { intervalMs: 1000 }, logger);
 * poller.start();
 * // ...
 * await poller.stop();
 * ```
 */
export function createWatchdogPoller(
  watchdog: Watchdog,
  timer: TimerAPI,
  config: PollerConfig,
  logger: Logger
): WatchdogPoller {
  let handle: number | null = null;
  const deliveries = new Set<Promise<void>>();

  async function check(): Promise<void> {
    try {
      if (!watchdog.poll()) {
        return;
      }
      const delivered = await watchdog.notify();
      if (!delivered) {
        logger.warning('Watchdog timeout alert was not delivered by any channel');
      }
    } catch (err) {
      logger.warning('Watchdog poll error: ' + describeError(err));
    }
  }

  function tick(): Promise<void> {
    const current = check().finally(function() {
      deliveries.delete(current);
    });
    deliveries.add(current);
    return current;
  }

  function start(): void {
    if (handle !== null) {
      return;
    }
    handle = timer.set(config.intervalMs, true, function() {
      void tick();
    });
    logger.debug('Watchdog poller started - interval: ' + config.intervalMs + 'ms');
  }

  async function stop(): Promise<void> {
    if (handle !== null) {
      timer.clear(handle);
      handle = null;
      logger.debug('Watchdog poller stopped');
    }
    await Promise.all(Array.from(deliveries));
  }

  return {
    start: start,
    stop: stop,
    tick: tick,
    isActive: function() { return handle !== null; }
  };
}
