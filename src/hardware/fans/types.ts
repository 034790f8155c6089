/**
 * Fan actuator types
 */

/**
 * BMC fan policy
 * `full` must be active before manual duty cycles stick
 */
export type FanMode = 'standard' | 'full' | 'optimal' | 'heavy-io';

/**
 * Commands fan banks
 */
export interface Actuator {
  /**
   * Set one bank's duty cycle
   * @param bankId - Bank id, 1..FAN_BANK_COUNT
   * @param dutyCycle - Duty cycle in BMC units
   * @throws {ActuationError} When the bank id is invalid or the bank rejects the command
   */
  setDutyCycle(bankId: number, dutyCycle: number): Promise<void>;

  /**
   * Switch the BMC fan policy
   * @throws {ActuationError} When the BMC rejects the command (bankId -1)
   */
  setFanMode(mode: FanMode): Promise<void>;
}

export interface FanCommandConfig {
  /** Raw command bytes preceding <zone> <duty> */
  dutyPrefix: readonly string[];
  /** BMC zone driven by bank 1; bank n drives firstZone + n - 1 */
  firstZone: number;
  /** Raw command bytes preceding <mode> */
  modePrefix: readonly string[];
}
