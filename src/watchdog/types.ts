/**
 * Watchdog type definitions
 */

import type { Logger } from '../logging/types';
import type { AlertDispatcher } from '../notifications/types';
import type { Clock } from '../types/common';

// ═══════════════════════════════════════════════════════════════
// STATE TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Watchdog state
 *
 * Idle keeps only the last threshold. Running always has a last feed time.
 */
export type WatchdogState =
  | {
    running: false;
    /** Last threshold in effect (0 before the first feed) */
    timeoutMs: number;
  }
  | {
    running: true;
    timeoutMs: number;
    /** Epoch ms of arming or the latest feed */
    lastFeedTime: number;
    /** Context captured when the watchdog was armed */
    startInfo: string;
    /** Latch set by the first poll that sees the timeout */
    timeoutSignaled: boolean;
  };

/**
 * Read-only copy of every state field
 */
export interface WatchdogSnapshot {
  running: boolean;
  timeoutMs: number;
  lastFeedTime: number | null;
  startInfo: string;
  timeoutOccurred: boolean;
}

// ═══════════════════════════════════════════════════════════════
// DEPENDENCY TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Where the watchdog hands its alerts
 */
export type AlertSink = Pick<AlertDispatcher, 'enqueue' | 'dispatch'>;

export interface WatchdogDependencies {
  clock: Clock;
  alerts: AlertSink;
  logger: Logger;
}

export interface WatchdogOptions {
  /** Threshold used when the arming feed carries none (default 30000) */
  defaultTimeoutMs?: number;
}

// ═══════════════════════════════════════════════════════════════
// WATCHDOG INTERFACE
// ═══════════════════════════════════════════════════════════════

export interface Watchdog {
  /** Arm, or reset the timer of a running watchdog; timeoutMs updates the threshold when given */
  feed(timeoutMs?: number, info?: string): boolean;
  /** True exactly once per timeout episode */
  poll(): boolean;
  /** Send the timeout alert and auto-stop; resolves with the delivery result */
  notify(): Promise<boolean>;
  /** Stop a running watchdog; false when already idle */
  manualStop(info?: string): boolean;
  isRunning(): boolean;
  timeoutOccurred(): boolean;
  currentTimeoutMs(): number;
  snapshot(): WatchdogSnapshot;
}
