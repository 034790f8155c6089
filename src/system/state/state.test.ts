/**
 * Unit tests for state manager
 */

import { createInitialState } from './state';

describe('State Manager', () => {
  describe('createInitialState', () => {
    it('should start idle with a zero actuation baseline', () => {
      const state = createInitialState(1000);

      expect(state).toEqual({
        phase: 'idle',
        lastActuatedTemperature: 0,
        lastActuatedDutyCycle: 0,
        currentDutyCycle: 0,
        lastTemperature: null,
        startTime: 1000,
        lastTickTime: 0,
        tickCount: 0,
        consecutiveSamplingErrors: 0,
        consecutiveActuationErrors: 0,
        consecutiveErrors: 0
      });
    });

    it('should return a fresh object each call', () => {
      const a = createInitialState(5);
      const b = createInitialState(5);

      a.tickCount = 3;

      expect(b.tickCount).toBe(0);
      expect(a).not.toBe(b);
    });
  });
});
