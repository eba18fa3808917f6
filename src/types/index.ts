/**
 * Shared types barrel export
 */

export { CHANNEL_IDS, isChannelId } from './common';
export type { ChannelId, Clock, Result } from './common';
export type { WatchdogUserConfig, WatchdogAppConstants, WatchdogConfig } from './config';
export {
  ValidationError,
  WatchdogValidationError,
  ChannelRequestError,
  describeError
} from './errors';
