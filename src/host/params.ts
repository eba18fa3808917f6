/**
 * Trigger parameter decoding
 *
 * Triggers arrive as a JSON string, a plain string or an already decoded
 * value. A plain string that is not JSON is taken as the info text.
 */

import { isRecord, tryParseJson } from '../utils/json';
import { isNonNegativeInteger } from '../utils/number';

import type { Result } from '../types/common';
import type { FeedParams } from './types';

/**
 * Render an info value as text
 * @param value - Raw info field
 * @returns '' for missing values, the string itself, or its JSON form
 */
function toInfo(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Decode a feed trigger parameter
 *
 * `timeout_ms` is taken only when the key is present with a non-null value;
 * a value that is not a non-negative integer rejects the trigger.
 *
 * @param param - Raw trigger parameter
 * @returns Decoded feed parameters, or the reason they were rejected
 *
 * @example
 * ```typescript
 * parseFeedParam('{"timeout_ms":60000,"info":"import"}');
 * // { ok: true, value: { timeoutMs: 60000, info: 'import' } }
 * parseFeedParam('heartbeat');
 * // { ok: true, value: { info: 'heartbeat' } }
 * ```
 */
export function parseFeedParam(param: unknown): Result<FeedParams> {
  let decoded = param;

  if (typeof param === 'string') {
    const parsed = tryParseJson(param);
    if (!parsed.ok) {
      return { ok: true, value: { info: param } };
    }
    decoded = parsed.value;
  }

  if (!isRecord(decoded)) {
    return { ok: true, value: { info: '' } };
  }

  const info = toInfo(decoded.info);
  const rawTimeout = decoded.timeout_ms;

  if (!('timeout_ms' in decoded) || rawTimeout === null) {
    return { ok: true, value: { info: info } };
  }

  if (!isNonNegativeInteger(rawTimeout)) {
    return { ok: false, error: 'timeout_ms must be a non-negative integer, got ' + JSON.stringify(rawTimeout) };
  }

  return { ok: true, value: { timeoutMs: rawTimeout, info: info } };
}

/**
 * Decode a stop trigger parameter
 * @param param - Raw trigger parameter
 * @returns Info text ('' when none was given)
 */
export function parseStopParam(param: unknown): string {
  let decoded = param;

  if (typeof param === 'string') {
    const parsed = tryParseJson(param);
    if (!parsed.ok) {
      return param;
    }
    decoded = parsed.value;
  }

  return isRecord(decoded) ? toInfo(decoded.info) : '';
}
