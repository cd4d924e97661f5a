import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Dotted path of the field an issue points at, `(root)` for the value itself. */
export function issuePath(issue: StandardSchemaV1.Issue): string {
  if (!issue.path?.length) {
    return '(root)';
  }

  return issue.path.map((segment) => String(typeof segment === 'object' ? segment.key : segment)).join('.');
}

/**
 * Error representing a validation error when validating with @standard-schema.
 * Every issue is kept, and each is rendered in the message as `path: message`.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static name = 'ValidationError';
  /** Schema validation issues */
  issues: StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError that extends Error, with accompanying Issues */
  constructor(message: string, issues: StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    const rendered = issues.map((issue) => `${issuePath(issue)}: ${issue.message}`).join('; ');
    super(issues.length ? `${message}; issues: ${rendered}` : message, opts);

    this.issues = issues;
  }

  /** Paths of the offending fields, in the order the schema reported them */
  get fields(): string[] {
    return this.issues.map(issuePath);
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract an {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
