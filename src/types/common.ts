/**
 * Common type definitions used throughout the project
 */

/**
 * Temperature reading in °C - null when no usable value is available
 */
export type TemperatureReading = number | null;

/**
 * Timer API abstraction
 * Keeps scheduling injectable so loops and sinks can be driven by fake timers in tests
 */
export interface TimerAPI {
  /**
   * Set a timer
   * @param intervalMs - Interval in milliseconds
   * @param repeat - Whether to repeat the timer
   * @param callback - Function to call when timer fires
   * @returns Timer handle usable with clear()
   */
  set(intervalMs: number, repeat: boolean, callback: () => void): number;

  /**
   * Cancel a timer created by set()
   * @param id - Timer handle
   */
  clear(id: number): void;
}
