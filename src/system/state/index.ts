export { createInitialState } from './state';
export type { ControllerState, ControllerPhase } from './types';
