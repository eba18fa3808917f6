import { resolveEnabledChannels } from '../notifications/settings';
import { isChannelId } from '../types/common';
import { addError, addWarning, validateChannelName, validateIntegerRange } from './helpers';

import type { WatchdogConfig } from '../types/config';
import type { ValidationIssue, ValidationResult } from './types';

/**
 * Validate the effective configuration
 *
 * Errors make the configuration unusable; warnings describe setups that run
 * but will not deliver alerts the way the user probably expects.
 *
 * @param config - Configuration to check
 * @returns Validity flag with collected errors and warnings
 */
export function validateConfig(config: WatchdogConfig): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  // Timing
  if (!Number.isInteger(config.DEFAULT_TIMEOUT_MS) || config.DEFAULT_TIMEOUT_MS < 0) {
    addError(errors, 'DEFAULT_TIMEOUT_MS', `DEFAULT_TIMEOUT_MS must be a non-negative integer (got ${config.DEFAULT_TIMEOUT_MS})`);
  }
  validateIntegerRange(
    config.POLL_INTERVAL_MS, 'POLL_INTERVAL_MS',
    config.MIN_POLL_INTERVAL_MS, config.MAX_POLL_INTERVAL_MS, errors
  );
  validateIntegerRange(
    config.HTTP_TIMEOUT_MS, 'HTTP_TIMEOUT_MS',
    config.MIN_HTTP_TIMEOUT_MS, config.MAX_HTTP_TIMEOUT_MS, errors
  );

  // Logging
  validateIntegerRange(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', config.LOG_LEVELS.DEBUG, config.LOG_LEVELS.CRITICAL, errors);
  validateIntegerRange(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', config.LOG_LEVELS.DEBUG, config.LOG_LEVELS.CRITICAL, errors);

  // Channels
  if (config.DEFAULT_CHANNEL !== '') {
    validateChannelName(config.DEFAULT_CHANNEL, 'DEFAULT_CHANNEL', errors);
  }
  if (config.CHANNEL_FILTER !== null) {
    for (const name of config.CHANNEL_FILTER) {
      validateChannelName(name, 'CHANNEL_FILTER', errors);
    }
  }

  const enabled = resolveEnabledChannels(config);
  if (enabled.length === 0) {
    addWarning(warnings, 'CHANNELS', 'No notification channel is enabled; alerts will only be logged');
  } else if (isChannelId(config.DEFAULT_CHANNEL) && enabled.indexOf(config.DEFAULT_CHANNEL) === -1) {
    addWarning(warnings, 'DEFAULT_CHANNEL', `Default channel "${config.DEFAULT_CHANNEL}" is not enabled`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}
