/**
 * Fan curve compilation and evaluation
 *
 * ## Business Context
 * Vendor firmware curves are coarse steps. A handful of user anchors
 * (temperature -> duty cycle) is turned into a continuous piecewise-linear
 * curve once at startup, then evaluated on every control loop.
 *
 * Outside the anchored range the nearest segment keeps its slope, so a
 * hotter-than-configured CPU keeps escalating fan speed until the output
 * bounds stop it.
 */

import { ConfigurationError } from '$types/errors';
import { clamp, isFiniteNumber, roundHalfAwayFromZero } from '@utils/number';

import { applySegment, segmentBetween, selectSegment, sortControlPoints, validateControlPoints } from './helpers';
import type { ControlPoint, CurveSample, DutyBounds, Segment } from './types';

const STEP_EPSILON = 1e-9;

/**
 * Compile control points into ordered linear segments
 *
 * Points are sorted by temperature and each adjacent pair yields the exact
 * line through both anchors, bounded above by the hotter anchor.
 *
 * A single point compiles to one flat segment, i.e. a constant curve at
 * that point's duty cycle for every temperature.
 *
 * @param points - Control points in any order (not mutated)
 * @returns Frozen segments in ascending upperBound order
 * @throws {ConfigurationError} If the set is empty, holds non-finite values or duplicate temperatures
 *
 * @example
 * ```typescript
 * const segments = compileCurve([
 *   { temperature: 40, dutyCycle: 25 },
 *   { temperature: 55, dutyCycle: 50 }
 * ]);
 * // [{ upperBound: 55, slope: 1.666..., intercept: -41.666... }]
 * ```
 */
export function compileCurve(points: readonly ControlPoint[]): readonly Segment[] {
  validateControlPoints(points);
  const sorted = sortControlPoints(points);

  if (sorted.length === 1) {
    return Object.freeze([
      Object.freeze({ upperBound: sorted[0].temperature, slope: 0, intercept: sorted[0].dutyCycle })
    ]);
  }

  const segments: Segment[] = [];
  for (let i = 1; i < sorted.length; i++) {
    segments.push(Object.freeze(segmentBetween(sorted[i - 1], sorted[i])));
  }

  return Object.freeze(segments);
}

/**
 * Evaluate the curve at a temperature
 *
 * The computed value is rounded half away from zero to a whole duty-cycle
 * unit, then clamped into the output bounds.
 *
 * @param temperature - Temperature in °C
 * @param segments - Segments from compileCurve()
 * @param bounds - Valid output range
 * @returns Duty cycle to command
 * @throws {Error} If the temperature is not finite or the curve is empty
 */
export function evaluateCurve(
  temperature: number,
  segments: readonly Segment[],
  bounds: DutyBounds
): number {
  if (!isFiniteNumber(temperature)) {
    throw new Error('evaluateCurve: temperature must be finite, got ' + temperature);
  }

  const segment = selectSegment(temperature, segments);
  const rounded = roundHalfAwayFromZero(applySegment(segment, temperature));

  return clamp(rounded, bounds.min, bounds.max);
}

/**
 * Sample the curve over a temperature range
 *
 * @param segments - Segments from compileCurve()
 * @param bounds - Valid output range
 * @param from - First temperature (°C)
 * @param to - Last temperature (°C), included when a whole number of steps reaches it
 * @param step - Temperature increment (°C), must be positive
 * @returns One row per sampled temperature
 * @throws {ConfigurationError} If the range or step is unusable
 */
export function sampleCurve(
  segments: readonly Segment[],
  bounds: DutyBounds,
  from: number,
  to: number,
  step: number
): CurveSample[] {
  if (!isFiniteNumber(from) || !isFiniteNumber(to) || to < from) {
    throw new ConfigurationError('Preview range must be finite with from <= to, got ' + from + '..' + to);
  }
  if (!isFiniteNumber(step) || step <= 0) {
    throw new ConfigurationError('Preview step must be a positive number, got ' + step);
  }

  const rows: CurveSample[] = [];
  // Absorbs float error so `to` survives steps such as 0.1
  const count = Math.floor((to - from) / step + STEP_EPSILON);
  for (let i = 0; i <= count; i++) {
    const temperature = Math.min(from + i * step, to);
    rows.push({ temperature: temperature, dutyCycle: evaluateCurve(temperature, segments, bounds) });
  }
  return rows;
}
