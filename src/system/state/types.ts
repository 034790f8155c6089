/**
 * Controller state type definitions
 */

import type { TemperatureReading } from '$types/common';

/**
 * Loop phase
 * `updating` from the start of a tick until it settles, `idle` between ticks
 */
export type ControllerPhase = 'idle' | 'updating';

/**
 * Controller state
 *
 * Owned by the control loop runner and replaced on every tick; collaborators
 * receive it as a value, never through a shared global.
 */
export interface ControllerState {
  phase: ControllerPhase;

  // ───────── ACTUATION ─────────
  /** Temperature at the last tick where every bank accepted the command */
  lastActuatedTemperature: number;
  /** Duty cycle sent at that tick */
  lastActuatedDutyCycle: number;
  /** Duty cycle the curve chose on the latest evaluated tick, sent or not */
  currentDutyCycle: number;

  // ───────── SAMPLING ─────────
  /** Last valid sample */
  lastTemperature: TemperatureReading;

  // ───────── TIMING ─────────
  startTime: number;
  lastTickTime: number;
  tickCount: number;

  // ───────── ERROR TRACKING ─────────
  consecutiveSamplingErrors: number;
  consecutiveActuationErrors: number;
  /** Unexpected tick failures (not sampling or actuation) */
  consecutiveErrors: number;
}
