/**
 * Time helper functions
 */

import { TIME_CONSTANTS } from '@utils/constants';

/**
 * Format uptime as a compact human-readable string
 * @param seconds - Elapsed seconds
 * @returns "45s", "12m" or "3h"
 */
export function formatUptime(seconds: number): string {
  if (seconds < TIME_CONSTANTS.SECONDS_PER_MINUTE) {
    return Math.round(seconds) + 's';
  } else if (seconds < TIME_CONSTANTS.SECONDS_PER_HOUR) {
    return Math.round(seconds / TIME_CONSTANTS.SECONDS_PER_MINUTE) + 'm';
  } else {
    return Math.round(seconds / TIME_CONSTANTS.SECONDS_PER_HOUR) + 'h';
  }
}

/**
 * Convert a poll interval in seconds to timer milliseconds
 * @param seconds - Interval in seconds
 * @returns Interval in whole milliseconds
 */
export function secondsToMs(seconds: number): number {
  return Math.round(seconds * TIME_CONSTANTS.MS_PER_SECOND);
}
