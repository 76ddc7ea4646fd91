/**
 * Configuration validation type definitions
 */

export type ValidationSeverity = 'CRITICAL' | 'WARNING';

/**
 * Hard failure: the configuration cannot be used
 */
export interface ValidationError {
  field: string;
  message: string;
  level: ValidationSeverity;
}

/**
 * Usable but questionable setting
 */
export interface ValidationWarning {
  field: string;
  message: string;
  level: ValidationSeverity;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}
