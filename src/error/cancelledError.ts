import { isErrorType } from './isErrorType.js';

/**
 * Error raised when the caller aborts a request, or the client is disposed mid-request.
 */
export class CancelledError extends Error {
  /** CancelledError error-name */
  name = 'CancelledError';
}

/**
 * Type guard for {@link CancelledError}.
 */
export function isCancelledError(error: unknown): error is CancelledError {
  return isErrorType(CancelledError, error);
}
