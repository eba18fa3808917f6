/**
 * Notification helper functions
 */

import type { ChannelId } from '../types/common';
import type { ChannelAttempt } from './types';

/**
 * Compute the fallback order for one dispatch
 *
 * The default channel goes first when it is enabled; the remaining enabled
 * channels follow in their enumerated order. Each channel appears once.
 *
 * @param defaultChannel - Configured default channel, or null
 * @param enabled - Enabled channels in enumerated order
 * @returns Channels to try, in order
 */
export function buildTryOrder(
  defaultChannel: ChannelId | null,
  enabled: readonly ChannelId[]
): ChannelId[] {
  const order: ChannelId[] = [];

  if (defaultChannel !== null && enabled.indexOf(defaultChannel) !== -1) {
    order.push(defaultChannel);
  }

  for (const channel of enabled) {
    if (order.indexOf(channel) === -1) {
      order.push(channel);
    }
  }

  return order;
}

/**
 * One-line summary of an attempt for logs and CLI output
 * @param attempt - Attempt to describe
 * @returns e.g. "telegram: ok" or "wechat: failed (HTTP 500)"
 */
export function describeAttempt(attempt: ChannelAttempt): string {
  if (attempt.ok) {
    return attempt.channel + ': ok';
  }
  return attempt.channel + ': failed (' + attempt.reason + ')';
}

/**
 * First line of a message, for compact log lines
 * @param text - Message text
 * @returns Text up to the first newline
 */
export function firstLine(text: string): string {
  const newline = text.indexOf('\n');
  return newline === -1 ? text : text.substring(0, newline);
}
