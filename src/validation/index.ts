export { validateConfig } from './validator';
export { addError, addWarning, validateIntegerRange, validateChannelName } from './helpers';
export type { ValidationIssue, ValidationResult } from './types';
