/**
 * Validation result types
 */

export interface ValidationError {
  field: string;
  message: string;
  level: 'CRITICAL';
}

export interface ValidationWarning {
  field: string;
  message: string;
  level: 'WARNING';
}

export interface ValidationResult {
  /** False when any error was found; warnings never fail validation */
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}
