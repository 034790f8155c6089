/**
 * Jest stand-in for the Logger interface
 */

import type { Logger } from '@logging';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warning: jest.fn(),
    critical: jest.fn(),
    startSinks: jest.fn().mockReturnValue([])
  };
}
