/**
 * Configuration validation
 *
 * Runs once at startup. Errors stop the controller before the loop starts;
 * warnings are logged and the controller runs anyway.
 */

import type { FanUserConfig } from '$types';
import type { ControlPoint } from '@core/curve';
import { isFiniteNumber } from '@utils/number';

import {
  addError,
  addWarning,
  validateBoolean,
  validateIntegerRange,
  validateNonEmptyString,
  validateNumberRange
} from './helpers';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';

/**
 * Validate curve control points against the duty bounds
 *
 * @param points - Control points in any order
 * @param dutyMin - Lowest duty cycle the controller may send
 * @param dutyMax - Highest duty cycle the controller may send
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 */
export function validateCurvePoints(
  points: readonly ControlPoint[],
  dutyMin: number,
  dutyMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (points.length === 0) {
    addError(errors, 'CURVE_POINTS', 'CURVE_POINTS needs at least one control point');
    return;
  }

  let finite = true;
  for (let i = 0; i < points.length; i++) {
    if (!isFiniteNumber(points[i].temperature) || !isFiniteNumber(points[i].dutyCycle)) {
      addError(errors, 'CURVE_POINTS', `Control point ${i} must have finite temperature and duty cycle`);
      finite = false;
    }
  }
  if (!finite) return;

  const sorted = points.slice().sort(function(a, b) {
    return a.temperature - b.temperature;
  });

  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].temperature === sorted[i - 1].temperature) {
      addError(errors, 'CURVE_POINTS', `Duplicate control point temperature ${sorted[i].temperature}C`);
    } else if (sorted[i].dutyCycle < sorted[i - 1].dutyCycle) {
      addWarning(
        warnings,
        'CURVE_POINTS',
        `Duty cycle falls from ${sorted[i - 1].dutyCycle} to ${sorted[i].dutyCycle} between ${sorted[i - 1].temperature}C and ${sorted[i].temperature}C`
      );
    }
  }

  if (points.length === 1) {
    addWarning(warnings, 'CURVE_POINTS', `Single control point: fans stay at ${points[0].dutyCycle} for every temperature`);
  }

  for (let i = 0; i < sorted.length; i++) {
    const duty = sorted[i].dutyCycle;
    if (duty < dutyMin || duty > dutyMax) {
      addWarning(
        warnings,
        'CURVE_POINTS',
        `Duty cycle ${duty} at ${sorted[i].temperature}C will be clamped to ${dutyMin}-${dutyMax}`
      );
    }
  }
}

/**
 * Validate user configuration
 *
 * @param config - User configuration after environment and CLI overrides
 * @returns Errors (fatal) and warnings (advisory)
 */
export function validateConfig(config: FanUserConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // Duty bounds (hardware units, one byte)
  validateIntegerRange(config.DUTY_MIN, 'DUTY_MIN', 0, 255, errors, warnings, 5, 60);
  validateIntegerRange(config.DUTY_MAX, 'DUTY_MAX', 1, 255, errors, warnings, 50, 100);
  if (config.DUTY_MIN > config.DUTY_MAX) {
    addError(errors, 'DUTY_MIN', `DUTY_MIN (${config.DUTY_MIN}) must not exceed DUTY_MAX (${config.DUTY_MAX})`);
  }

  validateCurvePoints(config.CURVE_POINTS, config.DUTY_MIN, config.DUTY_MAX, errors, warnings);

  // Loop
  validateNumberRange(config.DEBOUNCE_THRESHOLD_C, 'DEBOUNCE_THRESHOLD_C', 0, 20, errors, warnings, 0.5, 5);
  validateNumberRange(config.POLL_INTERVAL_SEC, 'POLL_INTERVAL_SEC', 1, 3600, errors, warnings, 2, 60);
  validateIntegerRange(config.FAN_BANK_COUNT, 'FAN_BANK_COUNT', 1, 8, errors, warnings, 1, 4);

  // Fans
  validateBoolean(config.FAN_MODE_FULL_ON_START, 'FAN_MODE_FULL_ON_START', errors);
  validateBoolean(config.RESTORE_FAN_MODE_ON_EXIT, 'RESTORE_FAN_MODE_ON_EXIT', errors);
  validateBoolean(config.DRY_RUN, 'DRY_RUN', errors);
  if (config.FAN_MODE_FULL_ON_START === false) {
    addWarning(warnings, 'FAN_MODE_FULL_ON_START', 'BMC fan mode is left as is; most boards ignore manual duty cycles outside full mode');
  }

  // IPMI
  validateNonEmptyString(config.IPMI_TOOL_PATH, 'IPMI_TOOL_PATH', errors);
  validateIntegerRange(config.IPMI_TIMEOUT_MS, 'IPMI_TIMEOUT_MS', 500, 120000, errors, warnings);
  if (config.IPMI_HOST !== '' && config.IPMI_USER === '') {
    addError(errors, 'IPMI_USER', 'IPMI_USER is required when IPMI_HOST is set');
  }
  if (isFiniteNumber(config.POLL_INTERVAL_SEC) && config.IPMI_TIMEOUT_MS >= config.POLL_INTERVAL_SEC * 1000) {
    addWarning(
      warnings,
      'IPMI_TIMEOUT_MS',
      `IPMI_TIMEOUT_MS (${config.IPMI_TIMEOUT_MS}) is not shorter than the poll interval (${config.POLL_INTERVAL_SEC * 1000}ms)`
    );
  }

  // Telemetry
  validateBoolean(config.TELEMETRY_ENABLED, 'TELEMETRY_ENABLED', errors);
  if (config.TELEMETRY_ENABLED) {
    validateNonEmptyString(config.TELEMETRY_FILE_PATH, 'TELEMETRY_FILE_PATH', errors);
    validateNonEmptyString(config.TELEMETRY_MEASUREMENT, 'TELEMETRY_MEASUREMENT', errors);
    validateNonEmptyString(config.TELEMETRY_HOSTNAME, 'TELEMETRY_HOSTNAME', errors);
  }

  // Logging
  validateIntegerRange(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', 0, 3, errors, warnings);
  validateNumberRange(config.GLOBAL_LOG_AUTO_DEMOTE_HOURS, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', 0, 8760, errors, warnings);
  validateBoolean(config.CONSOLE_ENABLED, 'CONSOLE_ENABLED', errors);
  validateIntegerRange(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', 0, 3, errors, warnings);
  validateIntegerRange(config.CONSOLE_BUFFER_SIZE, 'CONSOLE_BUFFER_SIZE', 1, 10000, errors, warnings);
  validateIntegerRange(config.CONSOLE_INTERVAL_MS, 'CONSOLE_INTERVAL_MS', 1, 10000, errors, warnings);
  validateBoolean(config.SLACK_ENABLED, 'SLACK_ENABLED', errors);
  validateIntegerRange(config.SLACK_LOG_LEVEL, 'SLACK_LOG_LEVEL', 0, 3, errors, warnings);
  validateIntegerRange(config.SLACK_BUFFER_SIZE, 'SLACK_BUFFER_SIZE', 1, 1000, errors, warnings);
  validateNumberRange(config.SLACK_RETRY_DELAY_SEC, 'SLACK_RETRY_DELAY_SEC', 0.1, 3600, errors, warnings);
  if (config.SLACK_ENABLED && config.SLACK_WEBHOOK_URL === '') {
    addWarning(warnings, 'SLACK_WEBHOOK_URL', 'SLACK_ENABLED is set but SLACK_WEBHOOK_URL is empty; Slack output is off');
  }

  return {
    valid: errors.length === 0,
    errors: errors,
    warnings: warnings
  };
}
