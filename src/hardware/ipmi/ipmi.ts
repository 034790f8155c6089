/**
 * ipmitool process runner
 * Spawns ipmitool with a hard timeout; output is returned as text
 */

import { execFile } from 'node:child_process';

import { IpmiCommandError } from './errors';
import { buildIpmiArgs, buildIpmiEnv, describeCommand } from './helpers';
import type { ExecFileFn, ExecOptions, ExecResult, IpmiConnection, IpmiRunner } from './types';

/**
 * Default spawner over child_process.execFile
 * @param file - Executable
 * @param args - Arguments
 * @param options - Timeout and output limit
 * @returns Captured output
 */
export function execFileAsync(file: string, args: readonly string[], options: ExecOptions): Promise<ExecResult> {
  return new Promise(function(resolve, reject) {
    execFile(
      file,
      args,
      {
        timeout: options.timeout,
        maxBuffer: options.maxBuffer,
        env: options.env === undefined ? undefined : { ...process.env, ...options.env },
        encoding: 'utf8'
      },
      function(error, stdout, stderr) {
        if (error) {
          const exitCode = typeof error.code === 'number' ? error.code : null;
          const reason = error.killed ? 'timed out after ' + options.timeout + 'ms' : error.message;
          reject(new IpmiCommandError(file + ' failed: ' + reason, exitCode, stderr.trim(), { cause: error }));
          return;
        }
        resolve({ stdout: stdout, stderr: stderr });
      }
    );
  });
}

/**
 * Create an ipmitool runner bound to one BMC
 *
 * @param connection - Connection settings
 * @param exec - Process spawner (defaults to execFile)
 * @returns Runner
 *
 * @example
 * ```typescript
 * const ipmi = createIpmiRunner({ toolPath: 'ipmitool', host: '', user: '', password: '', timeoutMs: 5000, maxBufferBytes: 1048576 });
 * const sdr = await ipmi.run(['sdr', 'type', 'temperature']);
 * ```
 */
export function createIpmiRunner(connection: IpmiConnection, exec: ExecFileFn = execFileAsync): IpmiRunner {
  async function run(args: readonly string[]): Promise<string> {
    const options: ExecOptions = { timeout: connection.timeoutMs, maxBuffer: connection.maxBufferBytes };
    const env = buildIpmiEnv(connection);
    if (env !== null) {
      options.env = env;
    }
    try {
      const result = await exec(connection.toolPath, buildIpmiArgs(connection, args), options);
      return result.stdout;
    } catch (err) {
      if (err instanceof IpmiCommandError) {
        throw err;
      }
      throw new IpmiCommandError(
        'Could not run ' + describeCommand(connection, args) + ': ' + String(err),
        null,
        '',
        { cause: err }
      );
    }
  }

  return {
    run: run
  };
}
