/**
 * Unit tests for validation helper functions
 */

import { addError, addWarning, validateChannelName, validateIntegerRange } from './helpers';
import type { ValidationIssue } from './types';

describe('Validation Helpers', () => {
  // ═══════════════════════════════════════════════════════════════
  // addError() / addWarning()
  // ═══════════════════════════════════════════════════════════════

  describe('addError', () => {
    it('should add error with CRITICAL level', () => {
      const errors: ValidationIssue[] = [];

      addError(errors, 'POLL_INTERVAL_MS', 'Value out of range');

      expect(errors).toEqual([{ level: 'CRITICAL', field: 'POLL_INTERVAL_MS', message: 'Value out of range' }]);
    });

    it('should accumulate multiple errors in order', () => {
      const errors: ValidationIssue[] = [];

      addError(errors, 'FIELD1', 'Error 1');
      addError(errors, 'FIELD2', 'Error 2');

      expect(errors.map((e) => e.field)).toEqual(['FIELD1', 'FIELD2']);
    });
  });

  describe('addWarning', () => {
    it('should add warning with WARNING level', () => {
      const warnings: ValidationIssue[] = [];

      addWarning(warnings, 'CHANNELS', 'Nothing enabled');

      expect(warnings).toEqual([{ level: 'WARNING', field: 'CHANNELS', message: 'Nothing enabled' }]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateIntegerRange()
  // ═══════════════════════════════════════════════════════════════

  describe('validateIntegerRange', () => {
    it('should accept values at both bounds', () => {
      const errors: ValidationIssue[] = [];

      validateIntegerRange(100, 'X', 100, 200, errors);
      validateIntegerRange(200, 'X', 100, 200, errors);

      expect(errors).toEqual([]);
    });

    it('should reject values outside the range', () => {
      const errors: ValidationIssue[] = [];

      validateIntegerRange(99, 'X', 100, 200, errors);

      expect(errors).toEqual([{ level: 'CRITICAL', field: 'X', message: 'X must be between 100 and 200 (got 99)' }]);
    });

    it('should reject non-integers', () => {
      const errors: ValidationIssue[] = [];

      validateIntegerRange(150.5, 'X', 100, 200, errors);

      expect(errors[0].message).toBe('X must be an integer (got 150.5)');
    });

    it('should reject NaN', () => {
      const errors: ValidationIssue[] = [];

      validateIntegerRange(NaN, 'X', 100, 200, errors);

      expect(errors[0].message).toBe('X must be an integer (got NaN)');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateChannelName()
  // ═══════════════════════════════════════════════════════════════

  describe('validateChannelName', () => {
    it('should accept known channels', () => {
      const errors: ValidationIssue[] = [];

      validateChannelName('telegram', 'DEFAULT_CHANNEL', errors);
      validateChannelName('wechat', 'DEFAULT_CHANNEL', errors);
      validateChannelName('slack', 'DEFAULT_CHANNEL', errors);

      expect(errors).toEqual([]);
    });

    it('should reject unknown channels', () => {
      const errors: ValidationIssue[] = [];

      validateChannelName('email', 'DEFAULT_CHANNEL', errors);

      expect(errors[0].message).toBe('Unknown channel "email" (expected one of telegram, wechat, slack)');
    });
  });
});
