/**
 * Error raised when an ipmitool invocation fails
 */
export class IpmiCommandError extends Error {
  /** Process exit code, null when killed or never started */
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, exitCode: number | null, stderr: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IpmiCommandError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
