/**
 * IPMI runner types
 */

/**
 * Connection settings for ipmitool
 *
 * An empty host means the local BMC through the in-band interface;
 * anything else goes over lanplus with the given credentials.
 */
export interface IpmiConnection {
  toolPath: string;
  host: string;
  user: string;
  password: string;
  timeoutMs: number;
  maxBufferBytes: number;
}

/**
 * Captured process output
 */
export interface ExecResult {
  stdout: string;
  stderr: string;
}

/**
 * Options passed to the process spawner
 */
export interface ExecOptions {
  timeout: number;
  maxBuffer: number;
  /** Added to the parent environment */
  env?: Readonly<Record<string, string>>;
}

/**
 * Process spawner (child_process.execFile shaped)
 * Rejects with IpmiCommandError on non-zero exit, timeout or spawn failure
 */
export type ExecFileFn = (file: string, args: readonly string[], options: ExecOptions) => Promise<ExecResult>;

/**
 * Runs ipmitool subcommands against one BMC
 */
export interface IpmiRunner {
  /**
   * Run a subcommand (connection flags are prepended)
   * @param args - e.g. ['sdr', 'type', 'temperature']
   * @returns Standard output
   */
  run(args: readonly string[]): Promise<string>;
}
