/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 */

import { CHANNEL_IDS, isChannelId } from '../types/common';
import { isFiniteNumber } from '../utils/number';

import type { ValidationIssue } from './types';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationIssue[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationIssue[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate an integer against an inclusive range
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param min - Minimum acceptable value
 * @param max - Maximum acceptable value
 * @param errors - Array to append errors to
 */
export function validateIntegerRange(
  value: number,
  field: string,
  min: number,
  max: number,
  errors: ValidationIssue[]
): void {
  if (!isFiniteNumber(value) || !Number.isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return;
  }

  if (value < min || value > max) {
    addError(errors, field, `${field} must be between ${min} and ${max} (got ${value})`);
  }
}

// ═══════════════════════════════════════════════════════════════
// CHANNEL VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a channel name
 *
 * @param name - Raw channel name
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validateChannelName(name: string, field: string, errors: ValidationIssue[]): void {
  if (!isChannelId(name)) {
    addError(errors, field, `Unknown channel "${name}" (expected one of ${CHANNEL_IDS.join(', ')})`);
  }
}
