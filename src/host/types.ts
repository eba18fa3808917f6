/**
 * Host integration type definitions
 */

// ═══════════════════════════════════════════════════════════════
// TIMER
// ═══════════════════════════════════════════════════════════════

/**
 * Timer service in the shape the poller schedules against
 */
export interface TimerAPI {
  /** Schedule callback after ms, repeating when repeat is true; returns a handle */
  set(ms: number, repeat: boolean, callback: () => void): number;
  /** Cancel a scheduled callback */
  clear(handle: number): void;
}

// ═══════════════════════════════════════════════════════════════
// ACTIONS
// ═══════════════════════════════════════════════════════════════

/**
 * Decoded feed trigger
 */
export interface FeedParams {
  /** Present only when the trigger carried timeout_ms */
  timeoutMs?: number;
  info: string;
}

export interface ActionResult {
  success: boolean;
}

/**
 * Trigger handlers for an external action dispatcher
 */
export interface WatchdogActions {
  feed(param: unknown): ActionResult;
  stop(param: unknown): ActionResult;
}

// ═══════════════════════════════════════════════════════════════
// POLLER
// ═══════════════════════════════════════════════════════════════

export interface PollerConfig {
  intervalMs: number;
}

/**
 * Recurring timeout check
 */
export interface WatchdogPoller {
  /** Schedule the recurring tick (no-op when already started) */
  start(): void;
  /** Cancel the tick and wait for pending timeout deliveries */
  stop(): Promise<void>;
  /** Poll now; resolves once a detected timeout has been delivered */
  tick(): Promise<void>;
  isActive(): boolean;
}
