/**
 * Notifier factory backed by the application configuration
 */

import { createSlackChannel } from './slack';
import { createTelegramChannel } from './telegram';
import { createWeChatChannel } from './wechat';

import type { WatchdogConfig } from '../../types/config';
import type { ChannelNotifier, FetchFn, NotifierFactory } from '../types';

/**
 * Check whether a channel has the credentials it needs
 * @param config - Current configuration
 * @param channel - Channel to check
 * @returns True when the channel could be created
 */
export function hasCredentials(config: WatchdogConfig, channel: ChannelNotifier['channel']): boolean {
  switch (channel) {
    case 'telegram':
      return config.TELEGRAM_BOT_TOKEN !== '' && config.TELEGRAM_CHAT_ID !== '';
    case 'wechat':
      return config.WECHAT_WEBHOOK_KEY !== '';
    case 'slack':
      return config.SLACK_WEBHOOK_URL !== '';
  }
}

/**
 * Create a factory that builds notifiers from the configuration current at call time
 *
 * @param getConfig - Returns the current configuration
 * @param fetchFn - Fetch implementation handed to every channel
 * @returns Factory returning null for channels without credentials
 */
export function createNotifierFactory(getConfig: () => WatchdogConfig, fetchFn: FetchFn): NotifierFactory {
  return function(channel) {
    const config = getConfig();
    if (!hasCredentials(config, channel)) {
      return null;
    }

    switch (channel) {
      case 'telegram':
        return createTelegramChannel({
          botToken: config.TELEGRAM_BOT_TOKEN,
          chatId: config.TELEGRAM_CHAT_ID,
          timeoutMs: config.HTTP_TIMEOUT_MS
        }, fetchFn);
      case 'wechat':
        return createWeChatChannel({
          webhookKey: config.WECHAT_WEBHOOK_KEY,
          timeoutMs: config.HTTP_TIMEOUT_MS
        }, fetchFn);
      case 'slack':
        return createSlackChannel({
          webhookUrl: config.SLACK_WEBHOOK_URL,
          timeoutMs: config.HTTP_TIMEOUT_MS
        }, fetchFn);
    }
  };
}
