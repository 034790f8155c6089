/**
 * Validation helper functions
 * Reusable checks that append to shared error and warning lists
 */

import { isFiniteNumber, isInteger } from '@utils/number';

import type { ValidationError, ValidationWarning } from './types';

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

/**
 * Validate that a value is a boolean
 */
export function validateBoolean(value: unknown, field: string, errors: ValidationError[]): void {
  if (typeof value !== 'boolean') {
    addError(errors, field, `${field} must be a boolean (got ${typeof value})`);
  }
}

/**
 * Validate that a string is not blank
 */
export function validateNonEmptyString(value: unknown, field: string, errors: ValidationError[]): void {
  if (typeof value !== 'string' || value.trim() === '') {
    addError(errors, field, `${field} must not be empty`);
  }
}

/**
 * Validate a number against critical and recommended ranges
 *
 * Critical range violations produce errors (validation fails).
 * Recommended range violations produce warnings (validation passes).
 *
 * @param value - Value to validate
 * @param field - Field name for messages
 * @param criticalMin - Hard lower limit
 * @param criticalMax - Hard upper limit
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum (optional)
 * @param recommendedMax - Recommended maximum (optional)
 */
export function validateNumberRange(
  value: number,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (!isFiniteNumber(value) || value < criticalMin || value > criticalMax) {
    addError(errors, field, `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`);
    return;
  }

  if (recommendedMin !== undefined && recommendedMax !== undefined) {
    if (value < recommendedMin || value > recommendedMax) {
      addWarning(
        warnings,
        field,
        `${field} is outside recommended range ${recommendedMin}-${recommendedMax} (got ${value})`
      );
    }
  }
}

/**
 * Validate an integer against critical and recommended ranges
 * Same contract as validateNumberRange, plus an integer check first
 */
export function validateIntegerRange(
  value: number,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return;
  }

  validateNumberRange(value, field, criticalMin, criticalMax, errors, warnings, recommendedMin, recommendedMax);
}
