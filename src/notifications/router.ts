/**
 * Notification fallback router
 *
 * Delivers one message through the enabled channels, default channel first,
 * stopping at the first channel that accepts it. A channel that resolves
 * `false`, rejects, or cannot be created counts as a failed attempt and the
 * router moves on; nothing a channel does reaches the caller as an exception.
 *
 * Channel settings are read on every dispatch. Notifiers are created on first
 * use and reused afterwards.
 */

import { describeError } from '../types/errors';
import { buildTryOrder, describeAttempt } from './helpers';

import type { Logger } from '../logging/types';
import type { ChannelId } from '../types/common';
import type {
  ChannelAttempt,
  ChannelNotifier,
  DispatchReport,
  NotificationRouter,
  NotificationSettings,
  NotifierFactory
} from './types';

/**
 * Create a notification router
 *
 * @param settings - Channel settings accessor
 * @param factory - Creates the notifier for a channel
 * @param logger - Diagnostics logger
 * @returns Router instance
 *
 * @example
 * ```typescript
 * const router = createNotificationRouter(settings, createNotifierFactory(getConfig, fetch), logger);
 * const delivered = await router.send('[WATCHDOG] Auto-Started');
 * ```
 */
export function createNotificationRouter(
  settings: NotificationSettings,
  factory: NotifierFactory,
  logger: Logger
): NotificationRouter {
  const notifiers = new Map<ChannelId, ChannelNotifier>();

  function getNotifier(channel: ChannelId): ChannelNotifier | null {
    const cached = notifiers.get(channel);
    if (cached !== undefined) {
      return cached;
    }
    const created = factory(channel);
    if (created !== null) {
      notifiers.set(channel, created);
    }
    return created;
  }

  async function attempt(channel: ChannelId, text: string): Promise<ChannelAttempt> {
    let notifier: ChannelNotifier | null;
    try {
      notifier = getNotifier(channel);
    } catch (err) {
      return { channel: channel, ok: false, reason: describeError(err) };
    }

    if (notifier === null) {
      return { channel: channel, ok: false, reason: 'not configured' };
    }

    logger.debug('Trying to send watchdog message via ' + channel);
    try {
      const sent = await notifier.sendMessage(text);
      return sent
        ? { channel: channel, ok: true }
        : { channel: channel, ok: false, reason: 'rejected by channel' };
    } catch (err) {
      return { channel: channel, ok: false, reason: describeError(err) };
    }
  }

  async function dispatch(text: string): Promise<DispatchReport> {
    const defaultChannel = settings.defaultNotificationChannel();
    const enabled = settings.enabledChannels();
    const attempts: ChannelAttempt[] = [];

    logger.debug('Watchdog notification - default channel: ' + (defaultChannel ?? 'none') +
      ', enabled channels: [' + enabled.join(', ') + ']');

    if (enabled.length === 0) {
      logger.debug('Watchdog notification skipped: no enabled notification channels');
      return { delivered: false, channel: null, attempts: attempts };
    }

    const order = buildTryOrder(defaultChannel, enabled);
    logger.debug('Watchdog notification try order: ' + order.join(' -> '));

    for (const channel of order) {
      const result = await attempt(channel, text);
      attempts.push(result);

      if (result.ok) {
        logger.debug('Watchdog notification sent via ' + channel);
        return { delivered: true, channel: channel, attempts: attempts };
      }
      logger.debug(describeAttempt(result) + ', trying next channel');
    }

    logger.warning('Watchdog notification failed: ' + attempts.map(describeAttempt).join('; '));
    return { delivered: false, channel: null, attempts: attempts };
  }

  async function send(text: string): Promise<boolean> {
    const report = await dispatch(text);
    return report.delivered;
  }

  return {
    send: send,
    dispatch: dispatch
  };
}
