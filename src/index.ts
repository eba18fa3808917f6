/**
 * Liveness watchdog public API
 *
 * - Watchdog state machine and alert texts (watchdog)
 * - Notification routing, queueing and channel transports (notifications)
 * - Host shim: parameter parsing, actions, poller (host)
 * - Logging, configuration validation and application wiring
 */

export * from './watchdog';
export * from './notifications';
export * from './host';
export * from './logging';
export * from './validation';
export * from './types';
export * from './boot';
