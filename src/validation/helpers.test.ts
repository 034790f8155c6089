/**
 * Unit tests for validation helper functions
 */

import {
  addError,
  addWarning,
  validateBoolean,
  validateIntegerRange,
  validateNonEmptyString,
  validateNumberRange
} from './helpers';
import type { ValidationError, ValidationWarning } from './types';

describe('Validation Helpers', () => {
  let errors: ValidationError[];
  let warnings: ValidationWarning[];

  beforeEach(() => {
    errors = [];
    warnings = [];
  });

  // ═══════════════════════════════════════════════════════════════
  // addError() / addWarning()
  // ═══════════════════════════════════════════════════════════════

  describe('addError', () => {
    it('should add error with CRITICAL level', () => {
      addError(errors, 'DUTY_MIN', 'Value out of range');

      expect(errors).toEqual([{ level: 'CRITICAL', field: 'DUTY_MIN', message: 'Value out of range' }]);
    });

    it('should accumulate errors in order', () => {
      addError(errors, 'FIELD1', 'Error 1');
      addError(errors, 'FIELD2', 'Error 2');

      expect(errors.map(function(e) { return e.field; })).toEqual(['FIELD1', 'FIELD2']);
    });
  });

  describe('addWarning', () => {
    it('should add warning with WARNING level', () => {
      addWarning(warnings, 'POLL_INTERVAL_SEC', 'Slow');

      expect(warnings).toEqual([{ level: 'WARNING', field: 'POLL_INTERVAL_SEC', message: 'Slow' }]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateBoolean()
  // ═══════════════════════════════════════════════════════════════

  describe('validateBoolean', () => {
    it('should accept true and false', () => {
      validateBoolean(true, 'DRY_RUN', errors);
      validateBoolean(false, 'DRY_RUN', errors);

      expect(errors).toHaveLength(0);
    });

    it('should reject non-boolean values with the observed type', () => {
      validateBoolean('true', 'DRY_RUN', errors);
      validateBoolean(1, 'DRY_RUN', errors);

      expect(errors[0].message).toBe('DRY_RUN must be a boolean (got string)');
      expect(errors[1].message).toBe('DRY_RUN must be a boolean (got number)');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateNonEmptyString()
  // ═══════════════════════════════════════════════════════════════

  describe('validateNonEmptyString', () => {
    it('should accept a non-blank string', () => {
      validateNonEmptyString('ipmitool', 'IPMI_TOOL_PATH', errors);

      expect(errors).toHaveLength(0);
    });

    it('should reject empty and whitespace-only strings', () => {
      validateNonEmptyString('', 'IPMI_TOOL_PATH', errors);
      validateNonEmptyString('   ', 'IPMI_TOOL_PATH', errors);

      expect(errors).toHaveLength(2);
      expect(errors[0].message).toBe('IPMI_TOOL_PATH must not be empty');
    });

    it('should reject non-strings', () => {
      validateNonEmptyString(42, 'TELEMETRY_FILE_PATH', errors);

      expect(errors).toHaveLength(1);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateNumberRange()
  // ═══════════════════════════════════════════════════════════════

  describe('validateNumberRange', () => {
    it('should accept values inside both ranges', () => {
      validateNumberRange(2, 'DEBOUNCE_THRESHOLD_C', 0, 20, errors, warnings, 0.5, 5);

      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(0);
    });

    it('should accept the critical boundaries', () => {
      validateNumberRange(0, 'X', 0, 20, errors, warnings);
      validateNumberRange(20, 'X', 0, 20, errors, warnings);

      expect(errors).toHaveLength(0);
    });

    it('should error outside the critical range', () => {
      validateNumberRange(25, 'DEBOUNCE_THRESHOLD_C', 0, 20, errors, warnings, 0.5, 5);

      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe('DEBOUNCE_THRESHOLD_C must be between 0 and 20 (got 25)');
      expect(warnings).toHaveLength(0);
    });

    it('should error on NaN and Infinity', () => {
      validateNumberRange(NaN, 'X', 0, 20, errors, warnings);
      validateNumberRange(Infinity, 'X', 0, 20, errors, warnings);

      expect(errors).toHaveLength(2);
    });

    it('should warn outside the recommended range', () => {
      validateNumberRange(8, 'DEBOUNCE_THRESHOLD_C', 0, 20, errors, warnings, 0.5, 5);

      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(1);
      expect(warnings[0].message).toBe('DEBOUNCE_THRESHOLD_C is outside recommended range 0.5-5 (got 8)');
    });

    it('should skip the recommended check when it is not given', () => {
      validateNumberRange(19, 'X', 0, 20, errors, warnings);

      expect(warnings).toHaveLength(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateIntegerRange()
  // ═══════════════════════════════════════════════════════════════

  describe('validateIntegerRange', () => {
    it('should accept integers in range', () => {
      validateIntegerRange(2, 'FAN_BANK_COUNT', 1, 8, errors, warnings, 1, 4);

      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(0);
    });

    it('should reject fractional values before the range check', () => {
      validateIntegerRange(1.5, 'FAN_BANK_COUNT', 1, 8, errors, warnings);

      expect(errors).toEqual([
        { level: 'CRITICAL', field: 'FAN_BANK_COUNT', message: 'FAN_BANK_COUNT must be an integer (got 1.5)' }
      ]);
    });

    it('should error outside the critical range', () => {
      validateIntegerRange(0, 'FAN_BANK_COUNT', 1, 8, errors, warnings);

      expect(errors[0].message).toBe('FAN_BANK_COUNT must be between 1 and 8 (got 0)');
    });

    it('should warn outside the recommended range', () => {
      validateIntegerRange(6, 'FAN_BANK_COUNT', 1, 8, errors, warnings, 1, 4);

      expect(errors).toHaveLength(0);
      expect(warnings[0].field).toBe('FAN_BANK_COUNT');
    });
  });
});
