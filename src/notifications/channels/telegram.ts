/**
 * Telegram bot channel
 */

import { isRecord } from '../../utils/json';
import { postJson } from './http';

import type { ChannelNotifier, FetchFn } from '../types';

export interface TelegramChannelConfig {
  botToken: string;
  chatId: string;
  timeoutMs: number;
}

const API_BASE_URL = 'https://api.telegram.org';

/**
 * Create a Telegram notifier
 *
 * Posts to the Bot API `sendMessage` method. Delivery counts as successful
 * only when the API answers 2xx with `ok: true`.
 *
 * @param config - Bot credentials and request timeout
 * @param fetchFn - Fetch implementation
 * @returns Notifier for the telegram channel
 */
export function createTelegramChannel(config: TelegramChannelConfig, fetchFn: FetchFn): ChannelNotifier {
  const url = API_BASE_URL + '/bot' + config.botToken + '/sendMessage';

  async function sendMessage(text: string): Promise<boolean> {
    const reply = await postJson(fetchFn, url, { chat_id: config.chatId, text: text }, config.timeoutMs);
    return reply.ok && isRecord(reply.body) && reply.body.ok === true;
  }

  return {
    channel: 'telegram',
    sendMessage: sendMessage
  };
}
