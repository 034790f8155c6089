/**
 * Logging: leveled logger, queued console sink, Slack webhook sink
 */

export { formatLogMessage, shouldLog, fmtTemp, toLogLevel } from './helpers';
export { createConsoleSink } from './console';
export { createSlackSink, postJson } from './slack';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  RoutedSink,
  LogSink,
  SinkStatus,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  SlackSink,
  SlackSinkConfig,
  PostJsonFn,
  FilterContext
} from './types';
