/**
 * Runtime type guards for untyped input.
 *
 * @packageDocumentation
 */

/**
 * Checks whether a value is a plain object (not null, not an array).
 *
 * @param value - Value to check.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
