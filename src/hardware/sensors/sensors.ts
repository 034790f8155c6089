/**
 * Temperature source over ipmitool SDR
 */

import { SamplingError } from '$types/errors';
import type { IpmiRunner } from '@hardware/ipmi';

import { aggregateTemperature, isValidReading, parseSdrTemperatures, selectChannels } from './helpers';
import type { SensorConfig, TemperatureSource } from './types';

/**
 * Create a temperature source that reads the BMC's temperature sensors
 *
 * Each sample runs one SDR query, keeps the configured channels, drops
 * implausible values and returns the hottest remaining reading.
 *
 * @param runner - ipmitool runner
 * @param config - Channel selection and plausibility range
 * @returns Temperature source
 */
export function createIpmiTemperatureSource(runner: IpmiRunner, config: SensorConfig): TemperatureSource {
  async function sample(): Promise<number> {
    let output: string;
    try {
      output = await runner.run(config.sdrArgs);
    } catch (err) {
      throw new SamplingError('SDR query failed: ' + (err instanceof Error ? err.message : String(err)), { cause: err });
    }

    const channels = selectChannels(parseSdrTemperatures(output), config.sensorNames);
    const values: number[] = [];
    for (let i = 0; i < channels.length; i++) {
      const value = channels[i].value;
      if (isValidReading(value, config.minValidC, config.maxValidC)) {
        values.push(value);
      }
    }

    const temperature = aggregateTemperature(values);
    if (temperature === null) {
      const scope = config.sensorNames.length > 0 ? ' from ' + config.sensorNames.join(', ') : '';
      throw new SamplingError('No usable temperature reading' + scope + ' (' + channels.length + ' channels seen)');
    }

    return temperature;
  }

  return {
    sample: sample
  };
}
