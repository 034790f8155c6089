/**
 * Telemetry emitters
 *
 * The file emitter keeps one line-protocol record on disk for a collector
 * such as Telegraf's file input to pick up.
 */

import { rename, rm, writeFile } from 'node:fs/promises';

import { TelemetryError } from '$types/errors';

import { formatLineProtocol } from './helpers';
import type { FileTelemetryConfig, TelemetryEmitter, WriteFileFn } from './types';

/**
 * Replace a file's contents atomically
 *
 * Writes a sibling temp file and renames it over the target, so readers
 * see either the old record or the new one, never a truncated file.
 *
 * @param path - Target file
 * @param data - File contents
 */
export async function replaceFile(path: string, data: string): Promise<void> {
  const tmpPath = path + '.' + process.pid + '.tmp';
  try {
    await writeFile(tmpPath, data, 'utf8');
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}

/**
 * Create an emitter that overwrites a file with the latest record
 * @param config - File path and record tags
 * @param write - File writer (defaults to replaceFile)
 * @returns Telemetry emitter
 */
export function createFileTelemetryEmitter(
  config: FileTelemetryConfig,
  write: WriteFileFn = replaceFile
): TelemetryEmitter {
  async function publish(dutyCycle: number): Promise<void> {
    let line: string;
    try {
      line = formatLineProtocol(config.measurement, config.hostname, dutyCycle);
    } catch (err) {
      throw new TelemetryError('Cannot format duty ' + dutyCycle + ': ' + String(err), { cause: err });
    }

    try {
      await write(config.filePath, line + '\n');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TelemetryError('Cannot write ' + config.filePath + ': ' + reason, { cause: err });
    }
  }

  return {
    publish: publish
  };
}

/**
 * Create an emitter that discards every record
 * @returns Telemetry emitter
 */
export function createNullTelemetryEmitter(): TelemetryEmitter {
  return {
    publish: function() {
      return Promise.resolve();
    }
  };
}
