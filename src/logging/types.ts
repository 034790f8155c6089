/**
 * Logging types
 */

/** 0=DEBUG 1=INFO 2=WARNING 3=CRITICAL */
export type LogLevel = 0 | 1 | 2 | 3;

/**
 * Level codes, passed in so the pure helpers never read CONFIG
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  /**
   * Start every sink that needs it
   * @returns One status per started sink, in sink order
   */
  startSinks(): SinkStatus[];
}

export interface LoggerConfig {
  level: LogLevel;
  /** INFO is dropped after this many hours of uptime; 0 keeps it */
  demoteHours: number;
}

/**
 * A sink and the lowest level routed to it
 */
export interface RoutedSink {
  sink: LogSink;
  minLevel: LogLevel;
}

export interface LoggerDependencies {
  /** Seconds */
  timeSource: () => number;
  sinks: RoutedSink[];
}

/**
 * Receives lines the logger already filtered and formatted
 */
export interface LogSink {
  write(line: string): void;
  start?(): SinkStatus;
}

/**
 * Outcome of starting a sink
 */
export interface SinkStatus {
  ok: boolean;
  message: string;
}

/**
 * Queued console output, drained on a timer
 */
export interface ConsoleSink extends LogSink {
  /** Starts the drain timer */
  start(): SinkStatus;
  /** Write everything still queued and stop the drain timer */
  flush(): void;
}

export interface ConsoleSinkConfig {
  /** Lines held before new ones are dropped */
  bufferSize: number;
  /** ms between drained lines */
  drainInterval: number;
}

/**
 * The parts of the global console a sink writes to
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

/**
 * Webhook sink; failed posts are queued and retried with backoff
 */
export interface SlackSink extends LogSink {
  /** Checks the webhook URL */
  start(): SinkStatus;
}

export interface SlackSinkConfig {
  enabled: boolean;
  /** Empty when not configured */
  webhookUrl: string;
  /** Queued lines before the oldest is dropped */
  bufferSize: number;
  /** First retry delay in ms, doubled per failure */
  retryDelayMs: number;
  /** Attempts before a line is dropped */
  maxRetries: number;
}

/**
 * Resolves on a 2xx response, rejects otherwise
 */
export type PostJsonFn = (url: string, body: unknown) => Promise<void>;

export interface FilterContext {
  currentLevel: LogLevel;
  /** Seconds since the logger was created */
  uptime: number;
  demoteHours: number;
}
