/**
 * Alert dispatcher
 *
 * Single-lane FIFO queue in front of the notification router. Watchdog state
 * changes hand their alerts to the queue and return immediately; delivery
 * runs one alert at a time in the order alerts were queued, so a slow channel
 * delays later alerts but never a feed or poll.
 */

import { describeError } from '../types/errors';
import { firstLine } from './helpers';

import type { Logger } from '../logging/types';
import type { AlertDispatcher, NotificationRouter } from './types';

function noop(): void {
  // queue link
}

/**
 * Create an alert dispatcher
 *
 * @param router - Router that performs delivery
 * @param logger - Diagnostics logger
 * @returns Dispatcher instance
 *
 * @example
 * ```typescript
 * const alerts = createAlertDispatcher(router, logger);
 * alerts.enqueue('[WATCHDOG] Auto-Started ...');
 * const delivered = await alerts.dispatch('[WATCHDOG] Timeout Alert! ...');
 * await alerts.drain();
 * ```
 */
export function createAlertDispatcher(
  router: NotificationRouter,
  logger: Logger
): AlertDispatcher {
  let tail: Promise<void> = Promise.resolve();
  let queued = 0;

  async function deliver(text: string): Promise<boolean> {
    try {
      return await router.send(text);
    } catch (err) {
      logger.warning('Alert dispatch error: ' + describeError(err));
      return false;
    } finally {
      queued--;
    }
  }

  function schedule(text: string): Promise<boolean> {
    queued++;
    const delivery = tail.then(function() { return deliver(text); });
    tail = delivery.then(noop);
    return delivery;
  }

  function enqueue(text: string): void {
    tail = schedule(text).then(function(delivered) {
      if (!delivered) {
        logger.warning('Alert not delivered: ' + firstLine(text));
      }
    });
  }

  function dispatch(text: string): Promise<boolean> {
    return schedule(text);
  }

  async function drain(): Promise<void> {
    let current = tail;
    await current;
    while (current !== tail) {
      current = tail;
      await current;
    }
  }

  function pending(): number {
    return queued;
  }

  return {
    enqueue: enqueue,
    dispatch: dispatch,
    drain: drain,
    pending: pending
  };
}
