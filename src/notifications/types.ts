/**
 * Notification type definitions
 *
 * Types shared by the channel transports, the fallback router and the
 * alert dispatcher.
 */

import type { ChannelId } from '../types/common';

// ═══════════════════════════════════════════════════════════════
// CHANNEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Send capability of a single channel
 *
 * Failure is either a resolved `false` or a rejected promise; the router
 * treats both the same way.
 */
export interface ChannelNotifier {
  /** Channel this notifier delivers through */
  readonly channel: ChannelId;
  /** Deliver one message */
  sendMessage(text: string): Promise<boolean>;
}

/**
 * Creates the notifier for a channel, or null when its credentials are missing
 */
export type NotifierFactory = (channel: ChannelId) => ChannelNotifier | null;

/**
 * Fetch implementation used by the HTTP channels
 */
export type FetchFn = typeof fetch;

// ═══════════════════════════════════════════════════════════════
// SETTINGS TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Read-only channel configuration, consulted on every dispatch
 */
export interface NotificationSettings {
  /** Channel tried first when it is enabled */
  defaultNotificationChannel(): ChannelId | null;
  /** Enabled channels in enumerated order */
  enabledChannels(): readonly ChannelId[];
}

// ═══════════════════════════════════════════════════════════════
// ROUTER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Outcome of trying one channel
 */
export type ChannelAttempt =
  | { channel: ChannelId; ok: true }
  | { channel: ChannelId; ok: false; reason: string };

/**
 * Outcome of one fallback dispatch
 */
export interface DispatchReport {
  /** True when some channel accepted the message */
  delivered: boolean;
  /** Channel that delivered, null when none did */
  channel: ChannelId | null;
  /** Attempts in the order they were made */
  attempts: ChannelAttempt[];
}

/**
 * Fallback router across the enabled channels
 */
export interface NotificationRouter {
  /** Deliver through the first channel that succeeds */
  send(text: string): Promise<boolean>;
  /** Same as send, with the per-channel attempts */
  dispatch(text: string): Promise<DispatchReport>;
}

// ═══════════════════════════════════════════════════════════════
// DISPATCHER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * FIFO hand-off between watchdog state changes and alert delivery
 */
export interface AlertDispatcher {
  /** Queue an alert without waiting for delivery */
  enqueue(text: string): void;
  /** Queue an alert and resolve with whether it was delivered */
  dispatch(text: string): Promise<boolean>;
  /** Resolve once every queued alert has been attempted */
  drain(): Promise<void>;
  /** Number of alerts queued or in delivery */
  pending(): number;
}
