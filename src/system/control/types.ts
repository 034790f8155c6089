/**
 * Control module type definitions
 */

import type { DutyBounds, Segment } from '@core/curve';
import type { Actuator } from '@hardware/fans';
import type { TemperatureSource } from '@hardware/sensors';
import type { Logger } from '@logging';
import type { ControllerState } from '@system/state/types';
import type { TelemetryEmitter } from '@telemetry';

/**
 * Loop tuning, fixed for the lifetime of the controller
 */
export interface ControlSettings {
  /** Minimum strict temperature change (°C) before fans are re-commanded */
  debounceThresholdC: number;
  /** Fan banks addressed as 0..fanBankCount-1 */
  fanBankCount: number;
  /** Seconds between the end of one tick and the start of the next */
  pollIntervalSec: number;
  /** Consecutive failures before warnings escalate to critical */
  maxConsecutiveErrors: number;
}

/**
 * Everything a tick needs besides the state itself
 */
export interface Controller {
  segments: readonly Segment[];
  bounds: DutyBounds;
  settings: ControlSettings;
  source: TemperatureSource;
  actuator: Actuator;
  telemetry: TelemetryEmitter;
  logger: Logger;
  /** Current time in seconds */
  timeSource: () => number;
  isDebug: boolean;
}

/**
 * Handle returned by startControlLoop
 */
export interface ControlLoopHandle {
  /**
   * Cancel the next tick
   * @returns Resolves once a tick already in progress has settled
   */
  stop(): Promise<void>;
  /** Latest state (from the last settled tick) */
  getState(): ControllerState;
  isRunning(): boolean;
}
