export { nowMs } from './time';
export { formatTimestamp, formatElapsedMs, elapsedSince } from './helpers';
