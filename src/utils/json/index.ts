/**
 * JSON guards for values that arrive untyped
 */

import type { Result } from '../../types/common';

/**
 * Plain object with string keys
 */
export type JsonRecord = Record<string, unknown>;

/**
 * Check if a value is a non-array object
 * @param value - Value to check
 * @returns true if value can be read by key
 */
export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON text without throwing
 * @param text - Candidate JSON text
 * @returns Parsed value, or the parser's message
 */
export function tryParseJson(text: string): Result<unknown> {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value: value };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}
