/**
 * Notifications module barrel export
 *
 * - Fallback router (createNotificationRouter)
 * - FIFO alert dispatcher (createAlertDispatcher)
 * - Channel settings and transports
 */

export { createNotificationRouter } from './router';
export { createAlertDispatcher } from './dispatcher';
export { createNotificationSettings, resolveEnabledChannels, resolveDefaultChannel } from './settings';
export { buildTryOrder, describeAttempt, firstLine } from './helpers';
export {
  createTelegramChannel,
  createWeChatChannel,
  createSlackChannel,
  createNotifierFactory,
  hasCredentials,
  postJson
} from './channels';

export type {
  ChannelNotifier,
  NotifierFactory,
  FetchFn,
  NotificationSettings,
  ChannelAttempt,
  DispatchReport,
  NotificationRouter,
  AlertDispatcher
} from './types';
export type { TelegramChannelConfig, WeChatChannelConfig, SlackChannelConfig, HttpReply } from './channels';
