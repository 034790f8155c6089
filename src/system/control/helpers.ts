/**
 * Control loop helper functions
 *
 * Each helper updates the tick's working copy of the state in place; the
 * copy is private to runTick until it is returned.
 */

import { ActuationError, SamplingError, TelemetryError, describeError } from '$types/errors';
import { fmtTemp } from '@logging';
import { isFiniteNumber } from '@utils/number';
import type { ControllerState } from '@system/state/types';

import type { Controller } from './types';

/**
 * Log a recoverable failure, escalating once it keeps repeating
 * @param controller - Controller (logger and limits)
 * @param count - Consecutive failures including this one
 * @param msg - Message to log
 */
export function logRepeatedFailure(controller: Controller, count: number, msg: string): void {
  if (count >= controller.settings.maxConsecutiveErrors) {
    controller.logger.critical(msg + " (" + count + " in a row)");
  } else {
    controller.logger.warning(msg);
  }
}

/**
 * Sample the temperature source
 *
 * A value that is not a finite number counts as a failed sample.
 *
 * @returns Temperature, or null when this tick has to be skipped
 */
export async function processSampling(controller: Controller, state: ControllerState): Promise<number | null> {
  try {
    const temperature: unknown = await controller.source.sample();
    if (!isFiniteNumber(temperature)) {
      throw new SamplingError('Temperature source returned ' + String(temperature));
    }
    if (state.consecutiveSamplingErrors > 0) {
      controller.logger.info("Temperature readings recovered after " + state.consecutiveSamplingErrors + " failed samples");
    }
    state.consecutiveSamplingErrors = 0;
    state.lastTemperature = temperature;
    return temperature;
  } catch (err) {
    state.consecutiveSamplingErrors++;
    const error = err instanceof SamplingError ? err : new SamplingError(describeError(err), { cause: err });
    logRepeatedFailure(controller, state.consecutiveSamplingErrors, describeError(error) + ", skipping tick");
    return null;
  }
}

/**
 * Publish the evaluated duty cycle; failures are logged and go no further
 */
export async function processTelemetry(controller: Controller, dutyCycle: number): Promise<void> {
  try {
    await controller.telemetry.publish(dutyCycle);
  } catch (err) {
    const error = err instanceof TelemetryError ? err : new TelemetryError(describeError(err), { cause: err });
    controller.logger.warning(describeError(error));
  }
}

/**
 * Command every fan bank
 *
 * Every bank is attempted even after a failure. The actuation baseline
 * only moves when all banks accepted the command.
 *
 * @returns Number of banks that failed
 */
export async function processActuation(
  controller: Controller,
  state: ControllerState,
  temperature: number,
  dutyCycle: number
): Promise<number> {
  let failures = 0;

  for (let bankId = 1; bankId <= controller.settings.fanBankCount; bankId++) {
    try {
      await controller.actuator.setDutyCycle(bankId, dutyCycle);
    } catch (err) {
      failures++;
      const error = err instanceof ActuationError ? err : new ActuationError(bankId, describeError(err), { cause: err });
      controller.logger.warning(describeError(error));
    }
  }

  if (failures === 0) {
    controller.logger.info(
      "Fans " + state.lastActuatedDutyCycle + " -> " + dutyCycle +
      " at " + fmtTemp(temperature) + " (was " + fmtTemp(state.lastActuatedTemperature) + ")"
    );
    state.lastActuatedTemperature = temperature;
    state.lastActuatedDutyCycle = dutyCycle;
    state.consecutiveActuationErrors = 0;
  } else {
    state.consecutiveActuationErrors++;
    logRepeatedFailure(
      controller,
      state.consecutiveActuationErrors,
      "Duty " + dutyCycle + " not applied on " + failures + "/" + controller.settings.fanBankCount + " banks, retrying next tick"
    );
  }

  return failures;
}
