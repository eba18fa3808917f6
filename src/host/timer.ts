/**
 * TimerAPI over Node's timers
 */

import type { TimerAPI } from './types';

interface ScheduledTimer {
  timer: NodeJS.Timeout;
  repeat: boolean;
}

/**
 * Create a TimerAPI backed by setTimeout/setInterval
 *
 * One-shot handles are forgotten once they fire.
 *
 * @returns Timer service
 */
export function createNodeTimerApi(): TimerAPI {
  const timers = new Map<number, ScheduledTimer>();
  let nextHandle = 1;

  function set(ms: number, repeat: boolean, callback: () => void): number {
    const handle = nextHandle++;

    if (repeat) {
      timers.set(handle, { timer: setInterval(callback, ms), repeat: true });
    } else {
      const timer = setTimeout(function() {
        timers.delete(handle);
        callback();
      }, ms);
      timers.set(handle, { timer: timer, repeat: false });
    }

    return handle;
  }

  function clear(handle: number): void {
    const scheduled = timers.get(handle);
    if (scheduled === undefined) {
      return;
    }
    if (scheduled.repeat) {
      clearInterval(scheduled.timer);
    } else {
      clearTimeout(scheduled.timer);
    }
    timers.delete(handle);
  }

  return {
    set: set,
    clear: clear
  };
}
