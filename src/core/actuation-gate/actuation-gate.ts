/**
 * Actuation debounce
 *
 * Fan commands go over a slow BMC link and every change is audible, so the
 * controller only re-commands fans once temperature has moved far enough
 * from the reading that was last acted on.
 */

import type { GateState } from './types';

/**
 * Decide whether a new duty cycle should be sent to the fans
 *
 * Only the temperature delta is compared; the duty cycle is accepted so
 * callers pass the full decision context.
 *
 * @param newTemperature - Current sampled temperature in °C
 * @param _newDutyCycle - Duty cycle evaluated for that temperature (unused)
 * @param state - Gate state
 * @param threshold - Minimum strict temperature change in °C
 * @returns True if the fans should be commanded
 */
export function shouldActuate(
  newTemperature: number,
  _newDutyCycle: number,
  state: GateState,
  threshold: number
): boolean {
  return Math.abs(newTemperature - state.lastActuatedTemperature) > threshold;
}
