/**
 * Sensor helper functions
 */

import type { TemperatureReading } from '$types/common';

import type { SdrReading } from './types';

const DEGREES_PATTERN = /^(-?\d+(?:\.\d+)?)\s*degrees C$/i;

/**
 * Validate sensor reading
 * @param value - Sensor value to validate
 * @param minValid - Lowest plausible value
 * @param maxValid - Highest plausible value
 * @returns True if value is valid
 */
export function isValidReading(value: TemperatureReading, minValid: number, maxValid: number): value is number {
  if (value === null || value === undefined) {
    return false;
  }

  // Check for NaN and Infinity
  if (isNaN(value) || !isFinite(value)) {
    return false;
  }

  if (value < minValid || value > maxValid) {
    return false;
  }

  return true;
}

/**
 * Parse SDR output into readings
 *
 * Rows look like `CPU Temp | 30h | ok | 3.1 | 45 degrees C`. Rows with
 * fewer than five columns are skipped; a value column that is not
 * "<n> degrees C" yields a null reading.
 *
 * @param output - Raw ipmitool stdout
 * @returns One entry per sensor row
 */
export function parseSdrTemperatures(output: string): SdrReading[] {
  const readings: SdrReading[] = [];
  const lines = output.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const columns = lines[i].split('|');
    if (columns.length < 5) {
      continue;
    }

    const name = columns[0].trim();
    if (name === '') {
      continue;
    }

    const match = DEGREES_PATTERN.exec(columns[4].trim());
    readings.push({ name: name, value: match ? parseFloat(match[1]) : null });
  }

  return readings;
}

/**
 * Pick readings by channel name
 * @param readings - Parsed readings
 * @param names - Wanted channel names (empty keeps everything)
 * @returns Matching readings
 */
export function selectChannels(readings: readonly SdrReading[], names: readonly string[]): SdrReading[] {
  if (names.length === 0) {
    return readings.slice();
  }
  return readings.filter(function(r) {
    return names.indexOf(r.name) !== -1;
  });
}

/**
 * Reduce channel values to the controlling temperature (hottest wins)
 * @param values - Valid readings
 * @returns Maximum, or null when there is nothing to aggregate
 */
export function aggregateTemperature(values: readonly number[]): TemperatureReading {
  if (values.length === 0) {
    return null;
  }
  return Math.max(...values);
}
