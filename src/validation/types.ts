/**
 * One configuration problem
 */
export interface ValidationIssue {
  field: string;
  message: string;
  level?: 'CRITICAL' | 'WARNING';
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}
