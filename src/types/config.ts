/**
 * Type definition for watchdog configuration
 */

import type { LogLevels } from '../logging/types';
import type { ChannelId } from './common';

/**
 * User-configurable settings
 * Everything a user might reasonably tune for timing, channels, and observability
 */
export interface WatchdogUserConfig {
  // ───────── WATCHDOG ─────────
  readonly DEFAULT_TIMEOUT_MS: number;
  readonly POLL_INTERVAL_MS: number;

  // ───────── NOTIFICATION CHANNELS ─────────
  /** Raw channel name ('' when unset); validated against CHANNEL_ORDER */
  readonly DEFAULT_CHANNEL: string;
  /** Raw channel names restricting the enabled set (null when unrestricted) */
  readonly CHANNEL_FILTER: readonly string[] | null;
  readonly HTTP_TIMEOUT_MS: number;

  // ───────── CHANNEL CREDENTIALS ─────────
  readonly TELEGRAM_BOT_TOKEN: string;
  readonly TELEGRAM_CHAT_ID: string;
  readonly WECHAT_WEBHOOK_KEY: string;
  readonly SLACK_WEBHOOK_URL: string;

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_COLORS: boolean;
  readonly CONSOLE_LOG_LEVEL: number;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: number;
  readonly LOG_TIMESTAMPS: boolean;
}

/**
 * Application constants
 * Internal constants that should rarely change
 */
export interface WatchdogAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── CHANNEL CONSTANTS ─────────
  readonly CHANNEL_ORDER: readonly ChannelId[];

  // ───────── VALIDATION CONSTANTS ─────────
  readonly MIN_POLL_INTERVAL_MS: number;
  readonly MAX_POLL_INTERVAL_MS: number;
  readonly MIN_HTTP_TIMEOUT_MS: number;
  readonly MAX_HTTP_TIMEOUT_MS: number;
}

/**
 * Complete watchdog configuration
 * Combines user config and app constants
 */
export type WatchdogConfig = WatchdogUserConfig & WatchdogAppConstants;
