/**
 * Console sink
 *
 * Lines are queued and printed one per drain interval; a full queue drops
 * the new line with a warning. flush() prints the rest on shutdown and
 * switches the sink to direct writes.
 */

import type { TimerAPI } from '$types';
import type { ConsoleAPI, ConsoleSink, ConsoleSinkConfig, SinkStatus } from '../types';

/**
 * Create a console sink with buffering
 *
 * @param timerApi - Timer API for scheduling drain
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (bufferSize, drainInterval)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(createNodeTimer({ unref: true }), console, {
 *   bufferSize: 150,
 *   drainInterval: 10
 * });
 * consoleSink.start();
 * consoleSink.write("Hello world");
 * ```
 */
export function createConsoleSink(
  timerApi: TimerAPI,
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): ConsoleSink {
  const buffer: string[] = [];
  let timerId: number | null = null;
  let flushed = false;

  /**
   * Drain one message from buffer
   * Called by timer at fixed interval
   */
  function drain() {
    const next = buffer.shift();
    if (next !== undefined) {
      consoleApi.log(next);
    }
  }

  /**
   * Start the drain timer (idempotent)
   */
  function startDrain() {
    if (timerId === null && !flushed) {
      timerId = timerApi.set(config.drainInterval, true, drain);
    }
  }

  /**
   * Write formatted message to buffer
   * After flush() messages go straight to the console
   * @param formattedMessage - Pre-formatted log message
   */
  function write(formattedMessage: string) {
    if (flushed) {
      consoleApi.log(formattedMessage);
      return;
    }

    if (buffer.length < config.bufferSize) {
      buffer.push(formattedMessage);
    } else {
      consoleApi.warn('Console log buffer overflow, dropping message: ' + formattedMessage);
    }
  }

  function flush(): void {
    if (timerId !== null) {
      timerApi.clear(timerId);
      timerId = null;
    }
    flushed = true;

    while (buffer.length > 0) {
      drain();
    }
  }

  function start(): SinkStatus {
    startDrain();
    return { ok: true, message: 'Console sink started' };
  }

  return {
    write: write,
    start: start,
    flush: flush
  };
}
