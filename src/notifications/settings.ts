/**
 * Channel settings read from the live configuration
 */

import { isChannelId } from '../types/common';
import { hasCredentials } from './channels/factory';

import type { ChannelId } from '../types/common';
import type { WatchdogConfig } from '../types/config';
import type { NotificationSettings } from './types';

/**
 * Resolve the enabled channels of a configuration
 *
 * A channel is enabled when its credentials are present and, if a channel
 * filter is set, the filter lists it. Order follows CHANNEL_ORDER.
 *
 * @param config - Configuration to read
 * @returns Enabled channels in enumerated order
 */
export function resolveEnabledChannels(config: WatchdogConfig): ChannelId[] {
  const filter = config.CHANNEL_FILTER;

  return config.CHANNEL_ORDER.filter(function(channel) {
    if (filter !== null && filter.indexOf(channel) === -1) {
      return false;
    }
    return hasCredentials(config, channel);
  });
}

/**
 * Resolve the configured default channel
 * @param config - Configuration to read
 * @returns The default channel, or null when unset or unknown
 */
export function resolveDefaultChannel(config: WatchdogConfig): ChannelId | null {
  return isChannelId(config.DEFAULT_CHANNEL) ? config.DEFAULT_CHANNEL : null;
}

/**
 * Create the read-only settings accessor consumed by the router
 *
 * Both accessors re-read getConfig() on every call so configuration
 * changes take effect on the next dispatch.
 *
 * @param getConfig - Returns the current configuration
 * @returns Settings accessor pair
 */
export function createNotificationSettings(getConfig: () => WatchdogConfig): NotificationSettings {
  return {
    defaultNotificationChannel: function() {
      return resolveDefaultChannel(getConfig());
    },
    enabledChannels: function() {
      return resolveEnabledChannels(getConfig());
    }
  };
}
