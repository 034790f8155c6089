/**
 * Unit conversion constants
 */

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
  SECONDS_PER_MINUTE: 60,
  SECONDS_PER_HOUR: 3600,
} as const;

export const SIZE_CONSTANTS = {
  BYTES_PER_MIB: 1024 * 1024,
} as const;
