/**
 * Fan curve type definitions
 */

/**
 * User-configured curve anchor
 */
export interface ControlPoint {
  /** Temperature in °C */
  temperature: number;

  /** Duty cycle commanded at this temperature (hardware units) */
  dutyCycle: number;
}

/**
 * Linear piece of a compiled curve: duty = slope * temp + intercept
 *
 * Valid for temperatures up to and including upperBound; a temperature equal
 * to upperBound belongs to this segment, not the next one.
 */
export interface Segment {
  readonly upperBound: number;
  readonly slope: number;
  readonly intercept: number;
}

/**
 * Valid output range for evaluated duty cycles
 */
export interface DutyBounds {
  /** Lowest duty cycle that may be commanded */
  min: number;

  /** Highest duty cycle that may be commanded */
  max: number;
}

/**
 * One row of a sampled curve (for previews)
 */
export interface CurveSample {
  temperature: number;
  dutyCycle: number;
}
