/**
 * Logger
 *
 * Filters by level (with INFO demotion after a day or so of uptime),
 * formats once, then routes the line to every sink whose minimum level it
 * meets. Console and Slack each get their own minimum.
 */

import { formatLogMessage, shouldLog } from './helpers';
import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, SinkStatus } from './types';

/**
 * Create a logger
 *
 * @param config - Level and demotion hours
 * @param dependencies - Clock and routed sinks
 * @param logLevels - Level codes
 * @returns Logger
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 24 },
 *   {
 *     timeSource: now,
 *     sinks: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.INFO },
 *       { sink: slackSink, minLevel: LOG_LEVELS.WARNING }
 *     ]
 *   },
 *   LOG_LEVELS
 * );
 * logger.warning('Bank 1 rejected duty 40'); // console and Slack
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  const sinks = dependencies.sinks;
  const startTime = dependencies.timeSource();

  function emit(level: LogLevel, msg: string): void {
    const context = {
      currentLevel: config.level,
      uptime: dependencies.timeSource() - startTime,
      demoteHours: config.demoteHours
    };
    if (!shouldLog(level, context, logLevels)) {
      return;
    }

    const line = formatLogMessage(level, msg, logLevels);
    sinks.forEach(function(routed) {
      if (level < routed.minLevel) {
        return;
      }
      try {
        routed.sink.write(line);
      } catch (err) {
        // Sink failures stay inside the logger
        console.warn('Logger sink error: ' + String(err));
      }
    });
  }

  function startSinks(): SinkStatus[] {
    const statuses: SinkStatus[] = [];
    sinks.forEach(function(routed) {
      if (routed.sink.start) {
        statuses.push(routed.sink.start());
      }
    });
    return statuses;
  }

  return {
    debug: function(msg: string) { emit(logLevels.DEBUG, msg); },
    info: function(msg: string) { emit(logLevels.INFO, msg); },
    warning: function(msg: string) { emit(logLevels.WARNING, msg); },
    critical: function(msg: string) { emit(logLevels.CRITICAL, msg); },
    startSinks: startSinks
  };
}
