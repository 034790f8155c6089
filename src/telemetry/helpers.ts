/**
 * Line protocol formatting
 */

import { toHexByte } from '@utils/number';

/**
 * Escape a measurement name, tag key or tag value
 * @param value - Raw text
 * @returns Text with commas, spaces and equals signs backslash-escaped
 */
export function escapeTag(value: string): string {
  return value.replace(/[,= ]/g, function(ch) {
    return '\\' + ch;
  });
}

/**
 * Format one duty-cycle record
 *
 * Example: `fan_curve,host=node1 duty_pct=38i,duty_raw="0x26"`
 *
 * @param measurement - Measurement name
 * @param hostname - Host tag value
 * @param dutyCycle - Duty cycle 0-255
 * @returns Line protocol record (no trailing newline)
 * @throws {RangeError} If the duty cycle is not a byte
 */
export function formatLineProtocol(measurement: string, hostname: string, dutyCycle: number): string {
  return escapeTag(measurement) +
    ',host=' + escapeTag(hostname) +
    ' duty_pct=' + dutyCycle + 'i' +
    ',duty_raw="' + toHexByte(dutyCycle) + '"';
}
