/**
 * IPMI helper functions
 */

import type { IpmiConnection } from './types';

/**
 * Build the full ipmitool argument list
 * @param connection - Connection settings
 * @param args - Subcommand arguments
 * @returns Interface flags followed by the subcommand
 */
export function buildIpmiArgs(connection: IpmiConnection, args: readonly string[]): string[] {
  if (connection.host === '') {
    return args.slice();
  }

  // -E: password comes from IPMI_PASSWORD, never argv
  return ['-I', 'lanplus', '-H', connection.host, '-U', connection.user, '-E'].concat(args);
}

/**
 * Build the environment additions for one ipmitool call
 * @param connection - Connection settings
 * @returns Variables to add, or null for the local interface
 */
export function buildIpmiEnv(connection: IpmiConnection): Record<string, string> | null {
  if (connection.host === '') {
    return null;
  }
  return { IPMI_PASSWORD: connection.password };
}

/**
 * Render a command for logs
 * @param connection - Connection settings
 * @param args - Subcommand arguments
 * @returns Printable command line
 */
export function describeCommand(connection: IpmiConnection, args: readonly string[]): string {
  return [connection.toolPath].concat(buildIpmiArgs(connection, args)).join(' ');
}
