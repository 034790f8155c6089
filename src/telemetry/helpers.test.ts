import { escapeTag, formatLineProtocol } from './helpers';

describe('telemetry helpers', () => {
  describe('escapeTag', () => {
    it('should escape commas, spaces and equals signs', () => {
      expect(escapeTag('rack 1,a=b')).toBe('rack\\ 1\\,a\\=b');
    });

    it('should leave plain names alone', () => {
      expect(escapeTag('node-01.lab')).toBe('node-01.lab');
    });
  });

  describe('formatLineProtocol', () => {
    it('should format the duty cycle as integer and raw hex fields', () => {
      expect(formatLineProtocol('fan_curve', 'node1', 38)).toBe('fan_curve,host=node1 duty_pct=38i,duty_raw="0x26"');
    });

    it('should escape the host tag', () => {
      expect(formatLineProtocol('fan_curve', 'my host', 0)).toBe('fan_curve,host=my\\ host duty_pct=0i,duty_raw="0x00"');
    });

    it('should reject a duty cycle outside a byte', () => {
      expect(() => formatLineProtocol('fan_curve', 'node1', 400)).toThrow(RangeError);
    });
  });
});
