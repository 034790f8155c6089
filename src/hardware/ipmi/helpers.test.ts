import { buildIpmiArgs, buildIpmiEnv, describeCommand } from './helpers';
import type { IpmiConnection } from './types';

describe('ipmi helpers', () => {
  const remote: IpmiConnection = {
    toolPath: 'ipmitool',
    host: 'bmc.local',
    user: 'admin',
    password: 'test-secret',
    timeoutMs: 1000,
    maxBufferBytes: 1024
  };

  describe('buildIpmiArgs', () => {
    it('should return the subcommand alone for the local interface', () => {
      expect(buildIpmiArgs({ ...remote, host: '' }, ['sdr', 'list'])).toEqual(['sdr', 'list']);
    });

    it('should not share the caller array', () => {
      const args = ['sdr'];
      const built = buildIpmiArgs({ ...remote, host: '' }, args);
      built.push('x');
      expect(args).toEqual(['sdr']);
    });

    it('should add lanplus flags for a remote host', () => {
      expect(buildIpmiArgs(remote, ['sdr'])).toEqual([
        '-I', 'lanplus', '-H', 'bmc.local', '-U', 'admin', '-E', 'sdr'
      ]);
    });

    it('should keep the password off the command line', () => {
      expect(buildIpmiArgs(remote, ['sdr'])).not.toContain('test-secret');
    });
  });

  describe('buildIpmiEnv', () => {
    it('should pass the password through IPMI_PASSWORD', () => {
      expect(buildIpmiEnv(remote)).toEqual({ IPMI_PASSWORD: 'test-secret' });
    });

    it('should add nothing for the local interface', () => {
      expect(buildIpmiEnv({ ...remote, host: '' })).toBeNull();
    });
  });

  describe('describeCommand', () => {
    it('should print remote commands without the password', () => {
      expect(describeCommand(remote, ['sdr'])).toBe('ipmitool -I lanplus -H bmc.local -U admin -E sdr');
    });

    it('should print local commands verbatim', () => {
      expect(describeCommand({ ...remote, host: '' }, ['raw', '0x30'])).toBe('ipmitool raw 0x30');
    });
  });
});
