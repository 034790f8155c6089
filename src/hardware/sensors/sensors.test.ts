/**
 * Tests for the ipmitool temperature source
 */

import { SamplingError } from '$types/errors';
import { IpmiCommandError } from '@hardware/ipmi';
import type { IpmiRunner } from '@hardware/ipmi';

import { createIpmiTemperatureSource } from './sensors';
import type { SensorConfig } from './types';

describe('createIpmiTemperatureSource', () => {
  const config: SensorConfig = {
    sensorNames: [],
    minValidC: -55,
    maxValidC: 150,
    sdrArgs: ['sdr', 'type', 'temperature']
  };

  function runnerReturning(output: string): IpmiRunner {
    return { run: jest.fn().mockResolvedValue(output) };
  }

  it('should query the SDR with the configured arguments', async () => {
    const runner = runnerReturning('CPU Temp | 30h | ok | 3.1 | 45 degrees C');
    const source = createIpmiTemperatureSource(runner, config);

    await expect(source.sample()).resolves.toBe(45);
    expect(runner.run).toHaveBeenCalledWith(['sdr', 'type', 'temperature']);
  });

  it('should return the hottest valid channel', async () => {
    const source = createIpmiTemperatureSource(runnerReturning([
      'CPU Temp    | 30h | ok | 3.1 | 61 degrees C',
      'System Temp | 31h | ok | 7.1 | 38 degrees C',
      'Bogus       | 33h | ok | 7.1 | 200 degrees C'
    ].join('\n')), config);

    await expect(source.sample()).resolves.toBe(61);
  });

  it('should only aggregate configured channels', async () => {
    const source = createIpmiTemperatureSource(runnerReturning([
      'CPU Temp    | 30h | ok | 3.1 | 61 degrees C',
      'System Temp | 31h | ok | 7.1 | 38 degrees C'
    ].join('\n')), { ...config, sensorNames: ['System Temp'] });

    await expect(source.sample()).resolves.toBe(38);
  });

  it('should reject with SamplingError when no channel has a reading', async () => {
    const source = createIpmiTemperatureSource(
      runnerReturning('CPU Temp | 30h | ns | 3.1 | No Reading'),
      { ...config, sensorNames: ['CPU Temp'] }
    );

    await expect(source.sample()).rejects.toThrow(
      new SamplingError('No usable temperature reading from CPU Temp (1 channels seen)')
    );
  });

  it('should wrap runner failures as SamplingError with the cause', async () => {
    const failure = new IpmiCommandError('ipmitool failed: timed out after 5000ms', null, '');
    const runner: IpmiRunner = { run: jest.fn().mockRejectedValue(failure) };
    const source = createIpmiTemperatureSource(runner, config);

    const error = await source.sample().catch(function(err: unknown) { return err; });
    expect(error).toBeInstanceOf(SamplingError);
    if (error instanceof SamplingError) {
      expect(error.message).toBe('SDR query failed: ipmitool failed: timed out after 5000ms');
      expect(error.cause).toBe(failure);
    }
  });
});
