/**
 * Slack incoming-webhook channel
 */

import { postJson } from './http';

import type { ChannelNotifier, FetchFn } from '../types';

export interface SlackChannelConfig {
  webhookUrl: string;
  timeoutMs: number;
}

/**
 * Create a Slack notifier
 *
 * Incoming webhooks reply with a plain-text "ok"; any 2xx counts as delivered.
 *
 * @param config - Webhook URL and request timeout
 * @param fetchFn - Fetch implementation
 * @returns Notifier for the slack channel
 */
export function createSlackChannel(config: SlackChannelConfig, fetchFn: FetchFn): ChannelNotifier {
  async function sendMessage(text: string): Promise<boolean> {
    const reply = await postJson(fetchFn, config.webhookUrl, { text: text }, config.timeoutMs);
    return reply.ok;
  }

  return {
    channel: 'slack',
    sendMessage: sendMessage
  };
}
