import type { ZodError } from 'zod';

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Rejected input to the scorer or the sitemap builders.
 */
export class ValidationError extends Error {
  /** Path of the first offending field */
  readonly field: string;
  readonly issues: ValidationIssue[];

  constructor(subject: string, issues: ValidationIssue[]) {
    const detail = issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join(', ');
    super(`Invalid ${subject}: ${detail}`);
    this.name = 'ValidationError';
    this.issues = issues;
    this.field = issues[0]?.path ?? '';
  }

  static fromZod(subject: string, error: ZodError): ValidationError {
    return new ValidationError(
      subject,
      error.errors.map(e => ({ path: e.path.join('.'), message: e.message }))
    );
  }
}
