/**
 * Logging helper functions
 */

import type { TemperatureReading } from '$types/common';
import { TIME_CONSTANTS } from '@utils/constants';

import type { LogLevel, LogLevels, FilterContext } from './types';

/**
 * Format a temperature for log lines
 * @param value - Temperature in °C
 * @returns e.g. "47.5C", or "n/a" when there is no reading
 */
export function fmtTemp(value: TemperatureReading): string {
  if (value === null) return "n/a";
  return value.toFixed(1) + "C";
}

/**
 * Prefix a message with its padded level tag, e.g. "⚠️ [WARNING]  msg"
 * @param level - Log level
 * @param msg - Message text
 * @param logLevels - Level codes
 * @returns Log line
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  switch (level) {
    case logLevels.CRITICAL:
      return "🚨 [CRITICAL] " + msg;
    case logLevels.WARNING:
      return "⚠️ [WARNING]  " + msg;
    case logLevels.INFO:
      return "ℹ️ [INFO]     " + msg;
    default:
      return "[DEBUG]    " + msg;
  }
}

/**
 * Decide whether a message passes the level filter
 *
 * Once the controller has run longer than demoteHours, routine INFO lines
 * (every fan change) are dropped unless the level is DEBUG. demoteHours 0
 * turns that off.
 *
 * @param level - Message level
 * @param context - Current level, uptime and demotion hours
 * @param logLevels - Level codes
 * @returns True to emit the message
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  const demoting = level === logLevels.INFO &&
    context.currentLevel !== logLevels.DEBUG &&
    context.demoteHours > 0;

  return !(demoting && context.uptime > context.demoteHours * TIME_CONSTANTS.SECONDS_PER_HOUR);
}

/**
 * Narrow a configured numeric level to a LogLevel
 * @param value - Level from configuration
 * @param fallback - Used when value is not 0-3
 */
export function toLogLevel(value: number, fallback: LogLevel): LogLevel {
  if (value === 0 || value === 1 || value === 2 || value === 3) {
    return value;
  }
  return fallback;
}
