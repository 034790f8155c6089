export { createIpmiActuator, createDryRunActuator, ALL_BANKS } from './fans';
export { bankToZone, buildSetDutyArgs, buildFanModeArgs, isFanMode } from './helpers';
export type { Actuator, FanCommandConfig, FanMode } from './types';
