import type { TimerAPI, WatchdogActions, WatchdogPoller } from '../host/types';
import type { ConsoleAPI, Logger } from '../logging/types';
import type { AlertDispatcher, FetchFn, NotificationRouter } from '../notifications/types';
import type { Clock } from '../types/common';
import type { WatchdogConfig } from '../types/config';
import type { Watchdog } from '../watchdog/types';
import type { ConfigEnv } from './config';

export type { InitMessage } from '../logging/types';

/**
 * Wired application
 */
export interface App {
  config: WatchdogConfig;
  logger: Logger;
  router: NotificationRouter;
  alerts: AlertDispatcher;
  watchdog: Watchdog;
  actions: WatchdogActions;
  poller: WatchdogPoller;
  /** Stop the poller and wait for queued alerts */
  shutdown(): Promise<void>;
}

/**
 * Overrides for initialize(); everything defaults to the real environment
 */
export interface InitOptions {
  /** Environment read by loadConfig (default process.env) */
  env?: ConfigEnv;
  /** Poll interval taking precedence over the environment */
  pollIntervalMs?: number;
  fetchFn?: FetchFn;
  clock?: Clock;
  timer?: TimerAPI;
  consoleApi?: ConsoleAPI;
  /** Called once the logger sinks are initialized */
  onReady?: (app: App) => void;
}
