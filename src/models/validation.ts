// Validation result types

/**
 * A single validation failure
 */
export interface ValidationIssue {
  /** Field or section that failed validation */
  field: string;
  message: string;
}

/**
 * Result of validating an artifact
 */
export interface ValidationResult {
  valid: boolean;
  /** Empty when valid */
  errors: ValidationIssue[];
}
