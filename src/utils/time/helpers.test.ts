/**
 * Tests for time formatting helpers
 */

import { formatTimestamp, formatElapsedMs, elapsedSince } from './helpers';

describe('Time Helpers', () => {
  describe('formatTimestamp', () => {
    it('should format local date and time with zero padding', () => {
      const ms = new Date(2026, 0, 5, 9, 4, 3).getTime();
      expect(formatTimestamp(ms)).toBe('2026-01-05 09:04:03');
    });

    it('should keep two-digit fields unchanged', () => {
      const ms = new Date(2025, 10, 23, 18, 45, 59).getTime();
      expect(formatTimestamp(ms)).toBe('2025-11-23 18:45:59');
    });

    it('should drop milliseconds', () => {
      const ms = new Date(2026, 2, 1, 12, 0, 0, 999).getTime();
      expect(formatTimestamp(ms)).toBe('2026-03-01 12:00:00');
    });
  });

  describe('formatElapsedMs', () => {
    it('should render one decimal place', () => {
      expect(formatElapsedMs(1100)).toBe('1100.0');
      expect(formatElapsedMs(0)).toBe('0.0');
      expect(formatElapsedMs(250.25)).toBe('250.3');
    });
  });

  describe('elapsedSince', () => {
    it('should return the difference', () => {
      expect(elapsedSince(1000, 1250)).toBe(250);
    });

    it('should return zero for identical timestamps', () => {
      expect(elapsedSince(1000, 1000)).toBe(0);
    });

    it('should clamp a backwards clock to zero', () => {
      expect(elapsedSince(2000, 1500)).toBe(0);
    });
  });
});
