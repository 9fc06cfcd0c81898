import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Renders issues as `path: message` pairs, e.g. `pageSize: Expected number`.
 */
function describeIssues(issues: ReadonlyArray<StandardSchemaV1.Issue>): string {
  return issues
    .map(({ path, message }) => {
      const keys = (path ?? []).map((segment) => String(typeof segment === 'object' ? segment.key : segment));
      return keys.length > 0 ? `${keys.join('.')}: ${message}` : message;
    })
    .join('; ');
}

/**
 * Error representing a payload or option set rejected by a @standard-schema validator.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  name = 'ValidationError';
  /** Schema validation issues */
  issues: StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError that extends Error, with accompanying Issues */
  constructor(message: string, issues: ReadonlyArray<StandardSchemaV1.Issue>, opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message} (${describeIssues(issues)})` : message, opts);

    this.issues = [...issues];
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
