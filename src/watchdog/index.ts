export { createWatchdog, DEFAULT_TIMEOUT_MS } from './watchdog';
export { buildStartMessage, buildUpdateMessage, buildStopMessage, buildTimeoutMessage } from './messages';

export type { TimeoutAlertDetails } from './messages';
export type {
  Watchdog,
  WatchdogState,
  WatchdogSnapshot,
  WatchdogDependencies,
  WatchdogOptions,
  AlertSink
} from './types';
