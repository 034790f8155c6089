/**
 * Unit tests for logger coordinator
 */

import { createLogger } from './logger';
import type { LogLevels, LogSink, RoutedSink } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('createLogger', () => {
  let mockTimeSource: jest.Mock<number, []>;
  let write: jest.Mock<void, [string]>;
  let mockSink: RoutedSink;

  beforeEach(() => {
    mockTimeSource = jest.fn(() => 100);
    write = jest.fn();
    mockSink = {
      sink: { write: write },
      minLevel: LOG_LEVELS.DEBUG
    };
  });

  describe('log level methods', () => {
    test('should tag each level', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.debug('d');
      logger.info('i');
      logger.warning('w');
      logger.critical('c');

      expect(write.mock.calls).toEqual([
        ['[DEBUG]    d'],
        ['ℹ️ [INFO]     i'],
        ['⚠️ [WARNING]  w'],
        ['🚨 [CRITICAL] c']
      ]);
    });
  });

  describe('level filtering', () => {
    test('should not log debug when level is INFO', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.debug('hidden');

      expect(write).not.toHaveBeenCalled();
    });

    test('should always log critical regardless of level', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.CRITICAL, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.warning('hidden');
      logger.critical('shown');

      expect(write).toHaveBeenCalledTimes(1);
      expect(write).toHaveBeenCalledWith('🚨 [CRITICAL] shown');
    });
  });

  describe('auto-demotion', () => {
    test('should demote INFO after demoteHours of uptime', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 1 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.info('early');
      mockTimeSource.mockReturnValue(100 + 3601);
      logger.info('late');
      logger.warning('still shown');

      expect(write.mock.calls).toEqual([
        ['ℹ️ [INFO]     early'],
        ['⚠️ [WARNING]  still shown']
      ]);
    });

    test('should keep INFO in DEBUG mode', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 1 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      mockTimeSource.mockReturnValue(100 + 7200);
      logger.info('kept');

      expect(write).toHaveBeenCalledWith('ℹ️ [INFO]     kept');
    });
  });

  describe('multiple sinks', () => {
    test('should filter by per-sink minLevel', () => {
      const slackWrite = jest.fn<void, [string]>();
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        {
          timeSource: mockTimeSource,
          sinks: [mockSink, { sink: { write: slackWrite }, minLevel: LOG_LEVELS.WARNING }]
        },
        LOG_LEVELS
      );

      logger.info('console only');
      logger.critical('both');

      expect(write).toHaveBeenCalledTimes(2);
      expect(slackWrite.mock.calls).toEqual([['🚨 [CRITICAL] both']]);
    });

    test('should continue to other sinks if one throws', () => {
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
      const broken: LogSink = {
        write: function() {
          throw new Error('sink down');
        }
      };
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [{ sink: broken, minLevel: LOG_LEVELS.DEBUG }, mockSink] },
        LOG_LEVELS
      );

      expect(() => logger.info('survives')).not.toThrow();
      expect(write).toHaveBeenCalledWith('ℹ️ [INFO]     survives');
      expect(warnSpy).toHaveBeenCalledWith('Logger sink error: Error: sink down');
      warnSpy.mockRestore();
    });

    test('should handle empty sinks array', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [] },
        LOG_LEVELS
      );

      expect(() => logger.critical('nowhere')).not.toThrow();
    });
  });

  describe('startSinks', () => {
    test('should collect a status from every sink that starts', () => {
      const first: LogSink = {
        write: jest.fn(),
        start: function() { return { ok: true, message: 'Console sink started' }; }
      };
      const second: LogSink = {
        write: jest.fn(),
        start: function() { return { ok: false, message: 'Slack enabled but SLACK_WEBHOOK_URL is not set' }; }
      };
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        {
          timeSource: mockTimeSource,
          sinks: [
            { sink: first, minLevel: LOG_LEVELS.DEBUG },
            mockSink,
            { sink: second, minLevel: LOG_LEVELS.WARNING }
          ]
        },
        LOG_LEVELS
      );

      expect(logger.startSinks()).toEqual([
        { ok: true, message: 'Console sink started' },
        { ok: false, message: 'Slack enabled but SLACK_WEBHOOK_URL is not set' }
      ]);
    });

    test('should return nothing when no sink needs starting', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      expect(logger.startSinks()).toEqual([]);
    });
  });
});
