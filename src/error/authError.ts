import { ApiError } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised for rejected credentials, unauthorized or forbidden access.
 */
export class AuthError extends ApiError {
  /** AuthError error-name */
  name = 'AuthError';
}

/**
 * Type guard for {@link AuthError}.
 */
export function isAuthError(error: unknown): error is AuthError {
  return isErrorType(AuthError, error);
}

/**
 * Extract an {@link AuthError} from an unknown error value, following nested causes.
 */
export function getAuthError(error: unknown): null | AuthError {
  return unwrapErrorType(AuthError, error);
}
