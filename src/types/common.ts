/**
 * Common type definitions used throughout the project
 */

/**
 * Identifier of a notification channel
 */
export type ChannelId = 'telegram' | 'wechat' | 'slack';

/**
 * All channels in their enumerated (fallback) order
 */
export const CHANNEL_IDS: readonly ChannelId[] = ['telegram', 'wechat', 'slack'];

/**
 * Narrow an arbitrary string to a known channel id
 * @param value - Candidate channel name
 * @returns True if value names a known channel
 */
export function isChannelId(value: string): value is ChannelId {
  return CHANNEL_IDS.some(function(id) { return id === value; });
}

/**
 * Source of the current time in epoch milliseconds
 */
export type Clock = () => number;

/**
 * Result of an operation that either yields a value or a reason it could not
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };
