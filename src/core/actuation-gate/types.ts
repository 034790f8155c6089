/**
 * Actuation gate type definitions
 */

/**
 * Slice of controller state the gate reads
 */
export interface GateState {
  /** Temperature (°C) at the last fully successful actuation */
  lastActuatedTemperature: number;
}
