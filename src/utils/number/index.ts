/**
 * Number guards
 *
 * Used wherever a value arrives untyped (parsed JSON, environment strings)
 * and must be narrowed before it reaches the watchdog.
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Check if a value is an integer >= 0
 * @param value - Value to check
 * @returns true if value is a non-negative integer
 */
export function isNonNegativeInteger(value: unknown): value is number {
  return isFiniteNumber(value) && Number.isInteger(value) && value >= 0;
}

/**
 * Parse a decimal integer from an environment-style string
 * @param raw - String to parse (undefined when the variable is unset)
 * @param fallback - Value used when raw is unset, blank or not an integer
 * @returns Parsed integer or fallback
 */
export function parseIntOr(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw.trim());
  return Number.isInteger(parsed) ? parsed : fallback;
}
