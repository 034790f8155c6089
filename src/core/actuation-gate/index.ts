export { shouldActuate } from './actuation-gate';
export type { GateState } from './types';
