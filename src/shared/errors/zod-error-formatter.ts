import type { ZodError, ZodIssue } from 'zod';
import { AppError } from './app-error.js';
import { ErrorCodes } from './error-codes.js';

export interface ValidationIssue {
  field: string;
  message: string;
}

// Issues on the value itself have an empty path
function fieldName(path: (string | number)[]): string {
  return path.length > 0 ? path.join('.') : '(root)';
}

export function toValidationIssues(issues: ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({ field: fieldName(issue.path), message: issue.message }));
}

export function formatZodError(error: ZodError): AppError {
  return new AppError('Validation failed', 400, true, ErrorCodes.VALIDATION_ERROR, {
    issues: toValidationIssues(error.issues),
  });
}
