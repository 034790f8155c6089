/**
 * Unit tests for logging helper functions
 */

import { formatLogMessage, shouldLog, fmtTemp, toLogLevel } from './helpers';
import type { FilterContext, LogLevels } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('formatLogMessage', () => {
  test('should prefix each level with its tag', () => {
    expect(formatLogMessage(LOG_LEVELS.DEBUG, 'm', LOG_LEVELS)).toBe('[DEBUG]    m');
    expect(formatLogMessage(LOG_LEVELS.INFO, 'm', LOG_LEVELS)).toBe('ℹ️ [INFO]     m');
    expect(formatLogMessage(LOG_LEVELS.WARNING, 'm', LOG_LEVELS)).toBe('⚠️ [WARNING]  m');
    expect(formatLogMessage(LOG_LEVELS.CRITICAL, 'm', LOG_LEVELS)).toBe('🚨 [CRITICAL] m');
  });

  test('should keep the message verbatim', () => {
    const msg = '[actuation] Bank 1 rejected duty 40: ipmitool failed: exit 1';
    expect(formatLogMessage(LOG_LEVELS.WARNING, msg, LOG_LEVELS)).toBe('⚠️ [WARNING]  ' + msg);
  });

  test('should handle empty message', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, '', LOG_LEVELS)).toBe('ℹ️ [INFO]     ');
  });
});

describe('shouldLog', () => {
  function context(currentLevel: FilterContext['currentLevel'], uptime: number, demoteHours: number): FilterContext {
    return { currentLevel: currentLevel, uptime: uptime, demoteHours: demoteHours };
  }

  describe('basic level filtering', () => {
    test('should log at or above the current level', () => {
      expect(shouldLog(LOG_LEVELS.INFO, context(LOG_LEVELS.INFO, 100, 24), LOG_LEVELS)).toBe(true);
      expect(shouldLog(LOG_LEVELS.CRITICAL, context(LOG_LEVELS.INFO, 100, 24), LOG_LEVELS)).toBe(true);
    });

    test('should not log below the current level', () => {
      expect(shouldLog(LOG_LEVELS.DEBUG, context(LOG_LEVELS.INFO, 100, 24), LOG_LEVELS)).toBe(false);
      expect(shouldLog(LOG_LEVELS.WARNING, context(LOG_LEVELS.CRITICAL, 100, 0), LOG_LEVELS)).toBe(false);
    });
  });

  describe('auto-demotion of INFO logs', () => {
    test('should demote INFO just past the threshold', () => {
      expect(shouldLog(LOG_LEVELS.INFO, context(LOG_LEVELS.INFO, 24 * 3600 + 1, 24), LOG_LEVELS)).toBe(false);
    });

    test('should keep INFO at the threshold', () => {
      expect(shouldLog(LOG_LEVELS.INFO, context(LOG_LEVELS.INFO, 24 * 3600, 24), LOG_LEVELS)).toBe(true);
    });

    test('should not demote in DEBUG mode', () => {
      expect(shouldLog(LOG_LEVELS.INFO, context(LOG_LEVELS.DEBUG, 48 * 3600, 24), LOG_LEVELS)).toBe(true);
    });

    test('should not demote when demoteHours is 0', () => {
      expect(shouldLog(LOG_LEVELS.INFO, context(LOG_LEVELS.INFO, 1000 * 3600, 0), LOG_LEVELS)).toBe(true);
    });

    test('should never demote WARNING or CRITICAL', () => {
      expect(shouldLog(LOG_LEVELS.WARNING, context(LOG_LEVELS.INFO, 48 * 3600, 24), LOG_LEVELS)).toBe(true);
      expect(shouldLog(LOG_LEVELS.CRITICAL, context(LOG_LEVELS.INFO, 48 * 3600, 24), LOG_LEVELS)).toBe(true);
    });

    test('should honour fractional demoteHours', () => {
      expect(shouldLog(LOG_LEVELS.INFO, context(LOG_LEVELS.INFO, 1801, 0.5), LOG_LEVELS)).toBe(false);
      expect(shouldLog(LOG_LEVELS.INFO, context(LOG_LEVELS.INFO, 1799, 0.5), LOG_LEVELS)).toBe(true);
    });
  });
});

describe('fmtTemp', () => {
  test('should format with one decimal place', () => {
    expect(fmtTemp(47.5)).toBe('47.5C');
    expect(fmtTemp(45)).toBe('45.0C');
    expect(fmtTemp(-3.25)).toBe('-3.3C');
  });

  test('should return n/a for null', () => {
    expect(fmtTemp(null)).toBe('n/a');
  });
});

describe('toLogLevel', () => {
  test('should pass through known levels', () => {
    expect(toLogLevel(0, 1)).toBe(0);
    expect(toLogLevel(3, 1)).toBe(3);
  });

  test('should fall back for anything else', () => {
    expect(toLogLevel(4, 1)).toBe(1);
    expect(toLogLevel(1.5, 2)).toBe(2);
    expect(toLogLevel(-1, 0)).toBe(0);
  });
});
