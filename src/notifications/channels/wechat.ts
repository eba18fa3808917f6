/**
 * WeCom (Enterprise WeChat) group robot channel
 */

import { isRecord } from '../../utils/json';
import { postJson } from './http';

import type { ChannelNotifier, FetchFn } from '../types';

export interface WeChatChannelConfig {
  webhookKey: string;
  timeoutMs: number;
}

const API_BASE_URL = 'https://qyapi.weixin.qq.com';

/**
 * Create a WeCom group-robot notifier
 *
 * The robot webhook answers HTTP 200 for most failures, so success is read
 * from `errcode === 0` in the body.
 *
 * @param config - Webhook key and request timeout
 * @param fetchFn - Fetch implementation
 * @returns Notifier for the wechat channel
 */
export function createWeChatChannel(config: WeChatChannelConfig, fetchFn: FetchFn): ChannelNotifier {
  const url = API_BASE_URL +
    '/cgi-bin/webhook/send?key=' + encodeURIComponent(config.webhookKey);

  async function sendMessage(text: string): Promise<boolean> {
    const reply = await postJson(fetchFn, url, { msgtype: 'text', text: { content: text } }, config.timeoutMs);
    return reply.ok && isRecord(reply.body) && reply.body.errcode === 0;
  }

  return {
    channel: 'wechat',
    sendMessage: sendMessage
  };
}
