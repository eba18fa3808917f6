/**
 * Application initialization
 */

import { createWatchdogActions } from '../host/actions';
import { createWatchdogPoller } from '../host/poller';
import { createNodeTimerApi } from '../host/timer';
import { createConsoleSink } from '../logging/console/console-sink';
import { toLogLevel } from '../logging/helpers';
import { createLogger } from '../logging/logger';
import { createNotifierFactory } from '../notifications/channels/factory';
import { createAlertDispatcher } from '../notifications/dispatcher';
import { createNotificationRouter } from '../notifications/router';
import { createNotificationSettings, resolveEnabledChannels } from '../notifications/settings';
import { nowMs } from '../utils/time';
import { validateConfig } from '../validation/validator';
import { createWatchdog } from '../watchdog/watchdog';
import { loadConfig } from './config';

import type { InitMessage, SinkWithLevel } from '../logging/types';
import type { WatchdogConfig } from '../types/config';
import type { App, InitOptions } from './types';

export const APP_VERSION = '1.0.0';

/**
 * Resolve the effective configuration for these options
 * @param options - Initialization options
 * @returns Configuration with the poll interval override applied
 */
export function resolveConfig(options: InitOptions = {}): WatchdogConfig {
  const config = loadConfig(options.env ?? process.env);
  return options.pollIntervalMs === undefined ? config : { ...config, POLL_INTERVAL_MS: options.pollIntervalMs };
}

/**
 * Build and wire the application
 *
 * Returns null when the configuration is invalid, after printing every
 * error. The poller is created but not started.
 *
 * @param options - Environment and dependency overrides
 * @returns Wired application, or null
 */
export function initialize(options: InitOptions = {}): App | null {
  const consoleApi = options.consoleApi ?? console;
  const clock = options.clock ?? nowMs;
  const config = resolveConfig(options);

  // Validate configuration
  const validation = validateConfig(config);

  if (!validation.valid) {
    consoleApi.error('INIT FAIL: Invalid configuration');
    validation.errors.forEach(function(err) {
      consoleApi.error('  [' + err.field + ']: ' + err.message);
    });
    return null;
  }

  // Setup logging
  const sinks: SinkWithLevel[] = [];
  if (config.CONSOLE_ENABLED) {
    sinks.push({
      sink: createConsoleSink(consoleApi, { colors: config.CONSOLE_COLORS }),
      minLevel: toLogLevel(config.CONSOLE_LOG_LEVEL)
    });
  }

  const logger = createLogger({
    level: toLogLevel(config.GLOBAL_LOG_LEVEL),
    timestamps: config.LOG_TIMESTAMPS
  }, {
    timeSource: clock,
    sinks: sinks
  }, config.LOG_LEVELS);

  // Wire notification path
  const getConfig = function() { return config; };
  const router = createNotificationRouter(
    createNotificationSettings(getConfig),
    createNotifierFactory(getConfig, options.fetchFn ?? fetch),
    logger
  );
  const alerts = createAlertDispatcher(router, logger);

  // Wire watchdog and host shim
  const watchdog = createWatchdog({ clock: clock, alerts: alerts, logger: logger }, {
    defaultTimeoutMs: config.DEFAULT_TIMEOUT_MS
  });
  const actions = createWatchdogActions(watchdog, logger);
  const poller = createWatchdogPoller(
    watchdog,
    options.timer ?? createNodeTimerApi(),
    { intervalMs: config.POLL_INTERVAL_MS },
    logger
  );

  async function shutdown(): Promise<void> {
    await poller.stop();
    await alerts.drain();
  }

  const app: App = {
    config: config,
    logger: logger,
    router: router,
    alerts: alerts,
    watchdog: watchdog,
    actions: actions,
    poller: poller,
    shutdown: shutdown
  };

  logger.initialize(function(_success: boolean, messages: InitMessage[]) {
    const enabled = resolveEnabledChannels(config);

    logger.info('🚀 Liveness Watchdog v' + APP_VERSION);
    logger.info('⏱️ Default timeout: ' + config.DEFAULT_TIMEOUT_MS + 'ms | Poll: ' + config.POLL_INTERVAL_MS +
      'ms | HTTP timeout: ' + config.HTTP_TIMEOUT_MS + 'ms');
    logger.info('📣 Channels: ' + (enabled.length > 0 ? enabled.join(', ') : 'none') +
      ' | Default: ' + (config.DEFAULT_CHANNEL === '' ? 'none' : config.DEFAULT_CHANNEL));

    validation.warnings.forEach(function(warn) {
      logger.warning('[' + warn.field + ']: ' + warn.message);
    });

    messages.forEach(function(message) {
      if (!message.success) {
        logger.warning(message.message);
      }
    });

    if (options.onReady) {
      options.onReady(app);
    }
  });

  return app;
}
