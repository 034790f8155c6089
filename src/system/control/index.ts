export { runTick, startControlLoop } from './control';
export { processActuation, processSampling, processTelemetry, logRepeatedFailure } from './helpers';
export type { Controller, ControlSettings, ControlLoopHandle } from './types';
