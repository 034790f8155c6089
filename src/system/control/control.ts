/**
 * Control loop implementation
 *
 * Tick: sample -> evaluate -> telemetry -> gate -> actuate every bank.
 * Ticks are chained with one-shot timers, so a slow BMC delays the next
 * tick instead of overlapping it.
 */

import type { TimerAPI } from '$types';
import { shouldActuate } from '@core/actuation-gate';
import { evaluateCurve } from '@core/curve';
import { fmtTemp } from '@logging';
import type { ControllerState } from '@system/state/types';
import { secondsToMs } from '@utils/time';

import { processActuation, processSampling, processTelemetry } from './helpers';
import type { ControlLoopHandle, Controller } from './types';

/**
 * Run one control tick
 *
 * Never rejects: an unexpected failure is logged as critical and counted in
 * consecutiveErrors, and the loop carries on.
 *
 * @param controller - Collaborators and settings
 * @param state - State after the previous tick (not mutated)
 * @returns State after this tick
 */
export async function runTick(controller: Controller, state: ControllerState): Promise<ControllerState> {
  const next: ControllerState = { ...state, phase: 'updating' };
  const logger = controller.logger;

  try {
    const temperature = await processSampling(controller, next);

    if (temperature !== null) {
      const dutyCycle = evaluateCurve(temperature, controller.segments, controller.bounds);
      next.currentDutyCycle = dutyCycle;

      await processTelemetry(controller, dutyCycle);

      const actuate = shouldActuate(temperature, dutyCycle, next, controller.settings.debounceThresholdC);
      if (controller.isDebug) {
        logger.debug("Tick " + (state.tickCount + 1) + ": temp=" + fmtTemp(temperature) + ", duty=" + dutyCycle + ", actuate=" + actuate);
      }

      if (actuate) {
        await processActuation(controller, next, temperature, dutyCycle);
      }
    }

    next.consecutiveErrors = 0;
  } catch (e) {
    const errorMsg = e instanceof Error ? e.message : String(e);
    logger.critical("Control tick crashed: " + errorMsg);
    next.consecutiveErrors++;
  }

  next.phase = 'idle';
  next.tickCount = state.tickCount + 1;
  next.lastTickTime = controller.timeSource();
  return next;
}

/**
 * Start the control loop
 *
 * Runs the first tick immediately, then one tick per poll interval measured
 * from the end of the previous tick.
 *
 * @param controller - Collaborators and settings
 * @param initialState - State before the first tick
 * @param timer - Timer API
 * @returns Handle to stop the loop and read its state
 */
export function startControlLoop(
  controller: Controller,
  initialState: ControllerState,
  timer: TimerAPI
): ControlLoopHandle {
  let state = initialState;
  let running = true;
  let timerId: number | null = null;
  let inFlight: Promise<void> | null = null;

  function schedule(): void {
    if (running) {
      timerId = timer.set(secondsToMs(controller.settings.pollIntervalSec), false, tick);
    }
  }

  function tick(): void {
    timerId = null;
    inFlight = runTick(controller, state)
      .then(function(next) {
        state = next;
      })
      .catch(function(err: unknown) {
        controller.logger.critical("Control loop error: " + String(err));
      })
      .finally(function() {
        inFlight = null;
        schedule();
      });
  }

  function stop(): Promise<void> {
    running = false;
    if (timerId !== null) {
      timer.clear(timerId);
      timerId = null;
    }
    return inFlight !== null ? inFlight : Promise.resolve();
  }

  tick();

  return {
    stop: stop,
    getState: function() {
      return state;
    },
    isRunning: function() {
      return running;
    }
  };
}
