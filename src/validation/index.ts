export { validateConfig, validateCurvePoints } from './validator';
export {
  addError,
  addWarning,
  validateBoolean,
  validateNonEmptyString,
  validateNumberRange,
  validateIntegerRange
} from './helpers';
export type { ValidationError, ValidationWarning, ValidationResult } from './types';
