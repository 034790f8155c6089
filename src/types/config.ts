/**
 * Type definition for Fan Curve Controller configuration
 */

import type { ControlPoint } from '@core/curve';
import type { LogLevels } from '@logging';

/**
 * User-configurable settings
 * Everything a user might reasonably tune for the curve, the BMC link, telemetry and observability
 */
export interface FanUserConfig {
  // ───────── CURVE & CONTROL ─────────
  readonly CURVE_POINTS: readonly ControlPoint[];
  readonly DUTY_MIN: number;
  readonly DUTY_MAX: number;
  readonly DEBOUNCE_THRESHOLD_C: number;
  readonly POLL_INTERVAL_SEC: number;

  // ───────── SENSORS ─────────
  readonly TEMP_SENSOR_NAMES: readonly string[];

  // ───────── FANS ─────────
  readonly FAN_BANK_COUNT: number;
  readonly FAN_MODE_FULL_ON_START: boolean;
  readonly RESTORE_FAN_MODE_ON_EXIT: boolean;
  readonly DRY_RUN: boolean;

  // ───────── IPMI ─────────
  readonly IPMI_TOOL_PATH: string;
  readonly IPMI_HOST: string;
  readonly IPMI_USER: string;
  readonly IPMI_PASSWORD: string;
  readonly IPMI_TIMEOUT_MS: number;

  // ───────── TELEMETRY ─────────
  readonly TELEMETRY_ENABLED: boolean;
  readonly TELEMETRY_FILE_PATH: string;
  readonly TELEMETRY_MEASUREMENT: string;
  readonly TELEMETRY_HOSTNAME: string;

  // ───────── SLACK SETTINGS ─────────
  readonly SLACK_ENABLED: boolean;
  readonly SLACK_LOG_LEVEL: number;
  readonly SLACK_WEBHOOK_URL: string;
  readonly SLACK_BUFFER_SIZE: number;
  readonly SLACK_RETRY_DELAY_SEC: number;

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: number;
  readonly CONSOLE_BUFFER_SIZE: number;
  readonly CONSOLE_INTERVAL_MS: number;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: number;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface FanAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── APPLICATION CONSTANTS ─────────
  readonly MAX_CONSECUTIVE_ERRORS: number;
  readonly SLACK_MAX_RETRIES: number;

  // ───────── SENSOR CONSTANTS ─────────
  readonly SENSOR_MIN_VALID_C: number;
  readonly SENSOR_MAX_VALID_C: number;

  // ───────── IPMI COMMAND CONSTANTS ─────────
  readonly IPMI_SDR_TEMPERATURE_ARGS: readonly string[];
  readonly IPMI_FAN_DUTY_PREFIX: readonly string[];
  readonly IPMI_FAN_FIRST_ZONE: number;
  readonly IPMI_FAN_MODE_PREFIX: readonly string[];
  readonly IPMI_MAX_BUFFER_BYTES: number;
}

/**
 * Complete Fan Curve Controller configuration
 * Combines user config and app constants
 */
export type FanConfig = FanUserConfig & FanAppConstants;
