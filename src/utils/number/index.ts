/**
 * Number utilities
 *
 * Strict numeric checks that do not coerce their input, plus the rounding
 * and clamping rules used when turning curve output into a fan command.
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 * - isFinite("5") = true (coerces to number)
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && isFinite(value);
}

/**
 * Check if a value is an integer
 *
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && isFinite(value) && Math.floor(value) === value;
}

/**
 * Round to the nearest integer, halves away from zero
 *
 * Math.round() sends -2.5 to -2; this sends it to -3, mirroring 2.5 -> 3.
 * Zero is always returned as +0.
 *
 * @param value - Value to round
 * @returns Rounded integer
 */
export function roundHalfAwayFromZero(value: number): number {
  const magnitude = Math.round(Math.abs(value));
  if (magnitude === 0) {
    return 0;
  }
  return value < 0 ? -magnitude : magnitude;
}

/**
 * Clamp a value into [min, max]
 *
 * @param value - Value to clamp
 * @param min - Lower bound
 * @param max - Upper bound
 * @returns Clamped value
 */
export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

/**
 * Format a byte as a hex literal
 * @param value - Integer 0-255
 * @returns Hex literal such as "0x0a"
 * @throws {RangeError} If value is not a byte
 */
export function toHexByte(value: number): string {
  if (!isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError('Value is not a byte: ' + value);
  }
  return '0x' + value.toString(16).padStart(2, '0');
}
