import { ApiError } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the requested URL does not exist on the server.
 */
export class NotFoundError extends ApiError {
  /** NotFoundError error-name */
  name = 'NotFoundError';
}

/**
 * Type guard for {@link NotFoundError}.
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return isErrorType(NotFoundError, error);
}

/**
 * Extract a {@link NotFoundError} from an unknown error value, following nested causes.
 */
export function getNotFoundError(error: unknown): null | NotFoundError {
  return unwrapErrorType(NotFoundError, error);
}
