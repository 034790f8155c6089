/**
 * Environment overrides
 *
 * Settings come from USER_CONFIG defaults, then the process environment
 * (optionally seeded from a .env file), then command-line flags.
 */

import { existsSync } from 'fs';

import * as dotenv from 'dotenv';

import type { FanUserConfig } from '$types';
import { ConfigurationError } from '$types/errors';
import type { ControlPoint } from '@core/curve';

import type { CliOptions, EnvSource } from './types';

const CONTROL_POINT_PATTERN = /^(-?\d+(?:\.\d+)?)\s*:\s*(-?\d+(?:\.\d+)?)$/;

/**
 * Load a .env file into process.env
 *
 * Values in the file take precedence over variables already set, so the
 * file is the single place to look when a setting surprises you.
 *
 * @param path - File to load
 * @param required - Throw when the file does not exist
 * @returns True when a file was loaded
 * @throws {ConfigurationError} When a required file is missing or unreadable
 */
export function loadEnvFile(path: string, required: boolean): boolean {
  if (!existsSync(path)) {
    if (required) {
      throw new ConfigurationError('Env file not found: ' + path);
    }
    return false;
  }

  const result = dotenv.config({ path: path, override: true });
  if (result.error) {
    throw new ConfigurationError('Cannot load env file ' + path + ': ' + result.error.message, { cause: result.error });
  }
  return true;
}

/**
 * Parse "temp:duty" pairs separated by commas
 * @param text - e.g. "30:20, 40:25, 55:40"
 * @returns Control points in the order given
 * @throws {ConfigurationError} On a malformed pair
 */
export function parseCurvePoints(text: string): ControlPoint[] {
  const points: ControlPoint[] = [];
  const parts = text.split(',');

  for (let i = 0; i < parts.length; i++) {
    const part = parts[i].trim();
    if (part === '') continue;

    const match = CONTROL_POINT_PATTERN.exec(part);
    if (match === null) {
      throw new ConfigurationError('Invalid control point "' + part + '" in CURVE_POINTS (expected <temp>:<duty>)');
    }
    points.push({ temperature: Number(match[1]), dutyCycle: Number(match[2]) });
  }

  return points;
}

/**
 * Split a comma list, dropping blanks
 */
export function parseList(text: string): string[] {
  return text.split(',').map(function(item) {
    return item.trim();
  }).filter(function(item) {
    return item !== '';
  });
}

function rawValue(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim();
}

export function readNumber(env: EnvSource, key: string, fallback: number): number {
  const raw = rawValue(env, key);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(key + ' must be a number, got "' + raw + '"');
  }
  return value;
}

export function readInteger(env: EnvSource, key: string, fallback: number): number {
  const value = readNumber(env, key, fallback);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(key + ' must be an integer, got ' + value);
  }
  return value;
}

export function readBoolean(env: EnvSource, key: string, fallback: boolean): boolean {
  const raw = rawValue(env, key);
  if (raw === undefined) return fallback;

  const lower = raw.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes' || lower === 'on') return true;
  if (lower === 'false' || lower === '0' || lower === 'no' || lower === 'off') return false;
  throw new ConfigurationError(key + ' must be true or false, got "' + raw + '"');
}

/**
 * Read a string setting; unlike numbers, surrounding whitespace is kept
 */
export function readString(env: EnvSource, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined ? fallback : value;
}

/**
 * Apply environment variables on top of a base configuration
 * Unset or blank variables keep the base value
 *
 * @param env - Variables (usually process.env)
 * @param base - Defaults
 * @returns New configuration
 * @throws {ConfigurationError} When a variable cannot be parsed
 */
export function loadUserConfig(env: EnvSource, base: FanUserConfig): FanUserConfig {
  const curve = rawValue(env, 'CURVE_POINTS');
  const sensorNames = rawValue(env, 'TEMP_SENSOR_NAMES');

  return {
    CURVE_POINTS: curve === undefined ? base.CURVE_POINTS : parseCurvePoints(curve),
    DUTY_MIN: readInteger(env, 'DUTY_MIN', base.DUTY_MIN),
    DUTY_MAX: readInteger(env, 'DUTY_MAX', base.DUTY_MAX),
    DEBOUNCE_THRESHOLD_C: readNumber(env, 'DEBOUNCE_THRESHOLD_C', base.DEBOUNCE_THRESHOLD_C),
    POLL_INTERVAL_SEC: readNumber(env, 'POLL_INTERVAL_SEC', base.POLL_INTERVAL_SEC),

    TEMP_SENSOR_NAMES: sensorNames === undefined ? base.TEMP_SENSOR_NAMES : parseList(sensorNames),

    FAN_BANK_COUNT: readInteger(env, 'FAN_BANK_COUNT', base.FAN_BANK_COUNT),
    FAN_MODE_FULL_ON_START: readBoolean(env, 'FAN_MODE_FULL_ON_START', base.FAN_MODE_FULL_ON_START),
    RESTORE_FAN_MODE_ON_EXIT: readBoolean(env, 'RESTORE_FAN_MODE_ON_EXIT', base.RESTORE_FAN_MODE_ON_EXIT),
    DRY_RUN: readBoolean(env, 'DRY_RUN', base.DRY_RUN),

    IPMI_TOOL_PATH: readString(env, 'IPMI_TOOL_PATH', base.IPMI_TOOL_PATH),
    IPMI_HOST: readString(env, 'IPMI_HOST', base.IPMI_HOST),
    IPMI_USER: readString(env, 'IPMI_USER', base.IPMI_USER),
    IPMI_PASSWORD: readString(env, 'IPMI_PASSWORD', base.IPMI_PASSWORD),
    IPMI_TIMEOUT_MS: readInteger(env, 'IPMI_TIMEOUT_MS', base.IPMI_TIMEOUT_MS),

    TELEMETRY_ENABLED: readBoolean(env, 'TELEMETRY_ENABLED', base.TELEMETRY_ENABLED),
    TELEMETRY_FILE_PATH: readString(env, 'TELEMETRY_FILE_PATH', base.TELEMETRY_FILE_PATH),
    TELEMETRY_MEASUREMENT: readString(env, 'TELEMETRY_MEASUREMENT', base.TELEMETRY_MEASUREMENT),
    TELEMETRY_HOSTNAME: readString(env, 'TELEMETRY_HOSTNAME', base.TELEMETRY_HOSTNAME),

    SLACK_ENABLED: readBoolean(env, 'SLACK_ENABLED', base.SLACK_ENABLED),
    SLACK_LOG_LEVEL: readInteger(env, 'SLACK_LOG_LEVEL', base.SLACK_LOG_LEVEL),
    SLACK_WEBHOOK_URL: readString(env, 'SLACK_WEBHOOK_URL', base.SLACK_WEBHOOK_URL),
    SLACK_BUFFER_SIZE: readInteger(env, 'SLACK_BUFFER_SIZE', base.SLACK_BUFFER_SIZE),
    SLACK_RETRY_DELAY_SEC: readNumber(env, 'SLACK_RETRY_DELAY_SEC', base.SLACK_RETRY_DELAY_SEC),

    CONSOLE_ENABLED: readBoolean(env, 'CONSOLE_ENABLED', base.CONSOLE_ENABLED),
    CONSOLE_LOG_LEVEL: readInteger(env, 'CONSOLE_LOG_LEVEL', base.CONSOLE_LOG_LEVEL),
    CONSOLE_BUFFER_SIZE: readInteger(env, 'CONSOLE_BUFFER_SIZE', base.CONSOLE_BUFFER_SIZE),
    CONSOLE_INTERVAL_MS: readInteger(env, 'CONSOLE_INTERVAL_MS', base.CONSOLE_INTERVAL_MS),

    GLOBAL_LOG_LEVEL: readInteger(env, 'GLOBAL_LOG_LEVEL', base.GLOBAL_LOG_LEVEL),
    GLOBAL_LOG_AUTO_DEMOTE_HOURS: readNumber(env, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', base.GLOBAL_LOG_AUTO_DEMOTE_HOURS)
  };
}

/**
 * Apply command-line flags, which win over the environment
 * --log-level sets both the global and the console level
 */
export function applyCliOverrides(config: FanUserConfig, options: CliOptions): FanUserConfig {
  return {
    ...config,
    POLL_INTERVAL_SEC: options.interval !== undefined ? options.interval : config.POLL_INTERVAL_SEC,
    DEBOUNCE_THRESHOLD_C: options.threshold !== undefined ? options.threshold : config.DEBOUNCE_THRESHOLD_C,
    DRY_RUN: options.dryRun === true ? true : config.DRY_RUN,
    GLOBAL_LOG_LEVEL: options.logLevel !== undefined ? options.logLevel : config.GLOBAL_LOG_LEVEL,
    CONSOLE_LOG_LEVEL: options.logLevel !== undefined ? options.logLevel : config.CONSOLE_LOG_LEVEL
  };
}
