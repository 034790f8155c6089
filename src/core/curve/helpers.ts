/**
 * Fan curve helper functions
 */

import { ConfigurationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import type { ControlPoint, Segment } from './types';

/**
 * Validate control points before compilation
 * @param points - Control points in any order
 * @throws {ConfigurationError} If the set is empty or holds non-finite values
 */
export function validateControlPoints(points: readonly ControlPoint[]): void {
  if (points.length === 0) {
    throw new ConfigurationError('Fan curve needs at least one control point');
  }

  for (let i = 0; i < points.length; i++) {
    const point = points[i];
    if (!isFiniteNumber(point.temperature)) {
      throw new ConfigurationError('Control point ' + i + ': temperature must be a finite number, got ' + point.temperature);
    }
    if (!isFiniteNumber(point.dutyCycle)) {
      throw new ConfigurationError('Control point ' + i + ': duty cycle must be a finite number, got ' + point.dutyCycle);
    }
  }
}

/**
 * Return a copy of the points sorted by temperature, rejecting duplicates
 * @param points - Validated control points
 * @returns New array in ascending temperature order
 * @throws {ConfigurationError} If two points share a temperature
 */
export function sortControlPoints(points: readonly ControlPoint[]): ControlPoint[] {
  const sorted = points.map(function(p) {
    return { temperature: p.temperature, dutyCycle: p.dutyCycle };
  });
  sorted.sort(function(a, b) {
    return a.temperature - b.temperature;
  });

  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].temperature === sorted[i - 1].temperature) {
      throw new ConfigurationError('Duplicate control point temperature: ' + sorted[i].temperature + 'C');
    }
  }

  return sorted;
}

/**
 * Build the exact line through two anchors
 * @param lower - Anchor with the lower temperature
 * @param upper - Anchor with the higher temperature
 * @returns Segment ending at the upper anchor
 */
export function segmentBetween(lower: ControlPoint, upper: ControlPoint): Segment {
  const slope = (upper.dutyCycle - lower.dutyCycle) / (upper.temperature - lower.temperature);
  return {
    upperBound: upper.temperature,
    slope: slope,
    intercept: upper.dutyCycle - slope * upper.temperature
  };
}

/**
 * Select the segment governing a temperature
 *
 * First segment (ascending) whose upperBound is at or above the temperature;
 * the last segment when the temperature is above every bound.
 *
 * @param temperature - Temperature in °C
 * @param segments - Compiled segments in ascending order
 * @returns Governing segment
 * @throws {Error} If segments is empty
 */
export function selectSegment(temperature: number, segments: readonly Segment[]): Segment {
  if (segments.length === 0) {
    throw new Error('selectSegment: curve has no segments');
  }

  for (let i = 0; i < segments.length; i++) {
    if (segments[i].upperBound >= temperature) {
      return segments[i];
    }
  }

  return segments[segments.length - 1];
}

/**
 * Apply a segment's formula
 * @param segment - Segment to apply
 * @param temperature - Temperature in °C
 * @returns Unrounded duty cycle
 */
export function applySegment(segment: Segment, temperature: number): number {
  return segment.slope * temperature + segment.intercept;
}
