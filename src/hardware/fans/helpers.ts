/**
 * Fan command builders
 */

import { toHexByte } from '@utils/number';

import type { FanMode } from './types';

const FAN_MODE_CODES: Record<FanMode, number> = {
  'standard': 0x00,
  'full': 0x01,
  'optimal': 0x02,
  'heavy-io': 0x04
};

/**
 * Check if a string names a fan mode
 * @param value - Candidate
 * @returns True if value is a FanMode
 */
export function isFanMode(value: string): value is FanMode {
  return Object.prototype.hasOwnProperty.call(FAN_MODE_CODES, value);
}

/**
 * Map a bank id (1-based) to the BMC zone it drives
 * @param bankId - Bank id, 1..FAN_BANK_COUNT
 * @param firstZone - BMC zone of bank 1
 * @returns BMC zone index
 * @throws {RangeError} If bankId is not a positive integer
 */
export function bankToZone(bankId: number, firstZone: number): number {
  if (!Number.isInteger(bankId) || bankId < 1) {
    throw new RangeError('Bank id must be a positive integer (got ' + bankId + ')');
  }
  return firstZone + bankId - 1;
}

/**
 * Build the raw command for one zone's duty cycle
 * @param prefix - Command bytes before zone and duty
 * @param zone - BMC zone index
 * @param dutyCycle - Duty cycle 0-255
 * @returns ipmitool arguments
 * @throws {RangeError} If zone or duty is not a byte
 */
export function buildSetDutyArgs(prefix: readonly string[], zone: number, dutyCycle: number): string[] {
  return prefix.concat([toHexByte(zone), toHexByte(dutyCycle)]);
}

/**
 * Build the raw command for a fan mode change
 * @param prefix - Command bytes before the mode
 * @param mode - Fan mode
 * @returns ipmitool arguments
 */
export function buildFanModeArgs(prefix: readonly string[], mode: FanMode): string[] {
  return prefix.concat([toHexByte(FAN_MODE_CODES[mode])]);
}
