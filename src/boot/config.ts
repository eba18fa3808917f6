import * as dotenv from 'dotenv';

import { parseLogLevel, toLogLevel } from '../logging/helpers';
import { parseIntOr } from '../utils/number';

import type { WatchdogAppConstants, WatchdogConfig, WatchdogUserConfig } from '../types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything a user might reasonably tune for timing,
//   channels, and observability. Environment overrides are
//   applied by loadConfig().
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<WatchdogUserConfig> = {
  // DEFAULT_TIMEOUT_MS
  //   Role: Threshold used when the first feed does not carry one.
  //   Critical: Non-negative integer.
  //   Recommended: 30000 ms; several poll intervals longer than the feed cadence.
  DEFAULT_TIMEOUT_MS: 30000,

  // POLL_INTERVAL_MS
  //   Role: Period of the timeout-detection tick. Detection latency is bounded by it.
  //   Critical: 100–60000 ms (error outside). Env: WATCHDOG_POLL_INTERVAL_MS.
  //   Recommended: 1000 ms.
  POLL_INTERVAL_MS: 1000,

  // DEFAULT_CHANNEL
  //   Role: Channel tried first when it is enabled.
  //   Critical: '' or one of telegram, wechat, slack. Env: WATCHDOG_DEFAULT_CHANNEL.
  //   Recommended: The channel the on-call person reads first.
  DEFAULT_CHANNEL: '',

  // CHANNEL_FILTER
  //   Role: Restricts enabled channels to the listed ones; null leaves every configured channel enabled.
  //   Critical: Known channel names only. Env: WATCHDOG_CHANNELS (comma list).
  //   Recommended: null.
  CHANNEL_FILTER: null,

  // HTTP_TIMEOUT_MS
  //   Role: Abort deadline for a single channel request.
  //   Critical: 1000–120000 ms (error outside). Env: WATCHDOG_HTTP_TIMEOUT_MS.
  //   Recommended: 10000 ms; a hung channel delays the fallback by this much.
  HTTP_TIMEOUT_MS: 10000,

  // TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID
  //   Role: Bot API credentials. Both are required to enable telegram.
  TELEGRAM_BOT_TOKEN: '',
  TELEGRAM_CHAT_ID: '',

  // WECHAT_WEBHOOK_KEY
  //   Role: WeCom group-robot key. Enables wechat when set.
  WECHAT_WEBHOOK_KEY: '',

  // SLACK_WEBHOOK_URL
  //   Role: Slack incoming-webhook URL. Enables slack when set.
  SLACK_WEBHOOK_URL: '',

  // CONSOLE_ENABLED
  //   Role: Master switch for Console logging.
  //   Critical: Boolean only.
  //   Recommended: true.
  CONSOLE_ENABLED: true,

  // CONSOLE_COLORS
  //   Role: Colorize console lines by level. Env: NO_COLOR disables.
  CONSOLE_COLORS: true,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum log severity sent to Console (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 0; GLOBAL_LOG_LEVEL does the filtering.
  CONSOLE_LOG_LEVEL: 0,

  // GLOBAL_LOG_LEVEL
  //   Role: Current master log verbosity (0=DEBUG..3=CRITICAL).
  //   Critical: Must match one of the LOG_LEVELS values. Env: LOG_LEVEL (name).
  //   Recommended: 1 (INFO) for normal operation, 0 (DEBUG) while diagnosing channels.
  GLOBAL_LOG_LEVEL: 1,

  // LOG_TIMESTAMPS
  //   Role: Prefix every log line with local time.
  LOG_TIMESTAMPS: true,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal constants that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<WatchdogAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // CHANNEL_ORDER
  //   Role: Enumerated channel order; fallback follows it after the default channel.
  CHANNEL_ORDER: ['telegram', 'wechat', 'slack'],

  // ═══════════════════════════════════════════════════════════════
  // VALIDATION CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  MIN_POLL_INTERVAL_MS: 100,
  MAX_POLL_INTERVAL_MS: 60000,
  MIN_HTTP_TIMEOUT_MS: 1000,
  MAX_HTTP_TIMEOUT_MS: 120000,
};

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG (DEFAULT EXPORT)
// ─────────────────────────────────────────────────────────────

const CONFIG: WatchdogConfig = { ...APP_CONSTANTS, ...USER_CONFIG };

export default CONFIG;

// ─────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────

/**
 * Environment variables read by loadConfig
 */
export type ConfigEnv = Readonly<Record<string, string | undefined>>;

/**
 * Load a .env file into process.env
 *
 * Variables already set in the environment win over the file.
 *
 * @param path - File to load (defaults to .env in the working directory)
 * @returns True when the file was read
 */
export function loadEnvFile(path?: string): boolean {
  const result = dotenv.config(path === undefined ? {} : { path: path });
  return result.error === undefined;
}

/**
 * Read a trimmed string variable
 * @param env - Environment
 * @param key - Variable name
 * @param fallback - Value when unset
 * @returns Trimmed value or fallback
 */
function readString(env: ConfigEnv, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined ? fallback : raw.trim();
}

/**
 * Split a comma list into lower-case names
 * @param raw - Comma-separated list (undefined when unset)
 * @param fallback - Value when unset or blank
 * @returns Names without blanks, or fallback
 */
function readList(raw: string | undefined, fallback: readonly string[] | null): readonly string[] | null {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return raw.split(',')
    .map(function(entry) { return entry.trim().toLowerCase(); })
    .filter(function(entry) { return entry !== ''; });
}

/**
 * Build the effective configuration from environment variables
 *
 * Values that are unset or do not parse keep the base value; range checks
 * are left to validateConfig so they can be reported together.
 *
 * @param env - Environment to read (usually process.env)
 * @param base - Configuration the environment overrides
 * @returns Effective configuration
 *
 * @example
 * ```typescript
 * loadEnvFile();
 * const config = loadConfig(process.env);
 * ```
 */
export function loadConfig(env: ConfigEnv, base: WatchdogConfig = CONFIG): WatchdogConfig {
  const noColor = env.NO_COLOR !== undefined && env.NO_COLOR !== '';

  return {
    ...base,
    POLL_INTERVAL_MS: parseIntOr(env.WATCHDOG_POLL_INTERVAL_MS, base.POLL_INTERVAL_MS),
    HTTP_TIMEOUT_MS: parseIntOr(env.WATCHDOG_HTTP_TIMEOUT_MS, base.HTTP_TIMEOUT_MS),
    DEFAULT_CHANNEL: readString(env, 'WATCHDOG_DEFAULT_CHANNEL', base.DEFAULT_CHANNEL).toLowerCase(),
    CHANNEL_FILTER: readList(env.WATCHDOG_CHANNELS, base.CHANNEL_FILTER),
    TELEGRAM_BOT_TOKEN: readString(env, 'TELEGRAM_BOT_TOKEN', base.TELEGRAM_BOT_TOKEN),
    TELEGRAM_CHAT_ID: readString(env, 'TELEGRAM_CHAT_ID', base.TELEGRAM_CHAT_ID),
    WECHAT_WEBHOOK_KEY: readString(env, 'WECHAT_WEBHOOK_KEY', base.WECHAT_WEBHOOK_KEY),
    SLACK_WEBHOOK_URL: readString(env, 'SLACK_WEBHOOK_URL', base.SLACK_WEBHOOK_URL),
    GLOBAL_LOG_LEVEL: parseLogLevel(env.LOG_LEVEL, toLogLevel(base.GLOBAL_LOG_LEVEL)),
    CONSOLE_COLORS: noColor ? false : base.CONSOLE_COLORS,
  };
}
