export { createIpmiRunner, execFileAsync } from './ipmi';
export { buildIpmiArgs, buildIpmiEnv, describeCommand } from './helpers';
export { IpmiCommandError } from './errors';
export type { IpmiConnection, IpmiRunner, ExecFileFn, ExecOptions, ExecResult } from './types';
