export { createTelegramChannel } from './telegram';
export { createWeChatChannel } from './wechat';
export { createSlackChannel } from './slack';
export { createNotifierFactory, hasCredentials } from './factory';
export { postJson } from './http';

export type { TelegramChannelConfig } from './telegram';
export type { WeChatChannelConfig } from './wechat';
export type { SlackChannelConfig } from './slack';
export type { HttpReply } from './http';
