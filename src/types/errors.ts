/**
 * Global error types for the liveness watchdog
 * Custom errors for validation and channel transport faults
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a watchdog operation receives an invalid argument
 */
export class WatchdogValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'WatchdogValidationError';
  }
}

/**
 * Error raised by a notification channel when its request cannot complete
 */
export class ChannelRequestError extends Error {
  /** HTTP status when the server answered, otherwise null */
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = 'ChannelRequestError';
    this.status = status;
  }
}

/**
 * Render any thrown value as a single log-friendly string
 * @param err - Value caught in a catch clause
 * @returns "Name: message" for errors, String(err) otherwise
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name + ': ' + err.message;
  }
  return String(err);
}
