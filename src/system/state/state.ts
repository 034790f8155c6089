/**
 * State management functions
 */

import type { ControllerState } from './types';

export * from './types';

/**
 * Create initial controller state
 *
 * The actuation baseline starts at 0°C / duty 0, so the first tick
 * actuates whenever its temperature differs from 0 by more than the
 * debounce threshold.
 *
 * @param nowSec - Current timestamp in seconds
 * @returns Idle state with no samples and no errors
 */
export function createInitialState(nowSec: number): ControllerState {
  return {
    phase: 'idle',

    lastActuatedTemperature: 0,
    lastActuatedDutyCycle: 0,
    currentDutyCycle: 0,

    lastTemperature: null,

    startTime: nowSec,
    lastTickTime: 0,
    tickCount: 0,

    consecutiveSamplingErrors: 0,
    consecutiveActuationErrors: 0,
    consecutiveErrors: 0
  };
}
