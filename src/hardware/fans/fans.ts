/**
 * Fan actuators
 * The ipmitool adapter drives real fans; the dry-run adapter only logs
 */

import { ActuationError } from '$types/errors';
import type { IpmiRunner } from '@hardware/ipmi';
import type { Logger } from '@logging';

import { bankToZone, buildFanModeArgs, buildSetDutyArgs } from './helpers';
import type { Actuator, FanCommandConfig, FanMode } from './types';

/** Bank id reported for commands that address the whole BMC */
export const ALL_BANKS = -1;

/**
 * Describe a caught value
 * @param err - Caught value
 * @returns Message text
 */
function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Create an actuator that sends raw fan commands through ipmitool
 * @param runner - ipmitool runner
 * @param config - Raw command prefixes and zone mapping
 * @returns Actuator
 */
export function createIpmiActuator(runner: IpmiRunner, config: FanCommandConfig): Actuator {
  async function setDutyCycle(bankId: number, dutyCycle: number): Promise<void> {
    let args: string[];
    try {
      args = buildSetDutyArgs(config.dutyPrefix, bankToZone(bankId, config.firstZone), dutyCycle);
    } catch (err) {
      throw new ActuationError(bankId, 'Invalid fan command: ' + reason(err), { cause: err });
    }

    try {
      await runner.run(args);
    } catch (err) {
      throw new ActuationError(bankId, 'Bank ' + bankId + ' rejected duty ' + dutyCycle + ': ' + reason(err), { cause: err });
    }
  }

  async function setFanMode(mode: FanMode): Promise<void> {
    try {
      await runner.run(buildFanModeArgs(config.modePrefix, mode));
    } catch (err) {
      throw new ActuationError(ALL_BANKS, 'Fan mode ' + mode + ' rejected: ' + reason(err), { cause: err });
    }
  }

  return {
    setDutyCycle: setDutyCycle,
    setFanMode: setFanMode
  };
}

/**
 * Create an actuator that logs the commands it would send
 * @param logger - Logger instance
 * @param config - Raw command prefixes and zone mapping
 * @returns Actuator that never touches hardware
 */
export function createDryRunActuator(logger: Logger, config: FanCommandConfig): Actuator {
  async function setDutyCycle(bankId: number, dutyCycle: number): Promise<void> {
    let args: string[];
    try {
      args = buildSetDutyArgs(config.dutyPrefix, bankToZone(bankId, config.firstZone), dutyCycle);
    } catch (err) {
      throw new ActuationError(bankId, 'Invalid fan command: ' + reason(err), { cause: err });
    }
    logger.info('[dry-run] bank ' + bankId + ' -> ' + dutyCycle + ': ipmitool ' + args.join(' '));
  }

  async function setFanMode(mode: FanMode): Promise<void> {
    logger.info('[dry-run] fan mode ' + mode + ': ipmitool ' + buildFanModeArgs(config.modePrefix, mode).join(' '));
  }

  return {
    setDutyCycle: setDutyCycle,
    setFanMode: setFanMode
  };
}
