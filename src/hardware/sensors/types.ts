/**
 * Sensor types
 */

import type { TemperatureReading } from '$types/common';

/**
 * Produces the controlling temperature for one tick
 */
export interface TemperatureSource {
  /**
   * Read the current temperature
   * @returns Temperature in °C
   * @throws {SamplingError} When no usable reading exists
   */
  sample(): Promise<number>;
}

/**
 * One temperature row from `ipmitool sdr type temperature`
 */
export interface SdrReading {
  /** Sensor name, e.g. "CPU Temp" */
  name: string;
  /** Reading in °C, null for "No Reading" or unparseable values */
  value: TemperatureReading;
}

export interface SensorConfig {
  /** Channels to aggregate; empty means every temperature channel */
  sensorNames: readonly string[];
  /** Lowest plausible reading in °C */
  minValidC: number;
  /** Highest plausible reading in °C */
  maxValidC: number;
  /** ipmitool arguments listing temperature sensors */
  sdrArgs: readonly string[];
}
