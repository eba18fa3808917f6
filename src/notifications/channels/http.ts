/**
 * JSON-over-HTTP helper shared by the channel transports
 */

import { ChannelRequestError } from '../../types/errors';
import { tryParseJson } from '../../utils/json';

import type { FetchFn } from '../types';

/**
 * Response as seen by a channel
 */
export interface HttpReply {
  /** HTTP status in 200..299 */
  ok: boolean;
  status: number;
  /** Parsed JSON body, or null when the body is not JSON */
  body: unknown;
}

/**
 * POST a JSON body and read the reply
 *
 * Aborts after timeoutMs and raises ChannelRequestError; network errors
 * propagate unchanged. Non-2xx replies are returned, not thrown.
 *
 * @param fetchFn - Fetch implementation
 * @param url - Target URL
 * @param payload - Body to serialize as JSON
 * @param timeoutMs - Abort deadline
 * @returns Status and parsed body
 */
export async function postJson(
  fetchFn: FetchFn,
  url: string,
  payload: unknown,
  timeoutMs: number
): Promise<HttpReply> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchFn(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });

    const text = await response.text();
    const parsed = tryParseJson(text);

    return {
      ok: response.ok,
      status: response.status,
      body: parsed.ok ? parsed.value : null,
    };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new ChannelRequestError(`Request timeout after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
