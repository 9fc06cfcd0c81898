import { ApiError } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised for malformed requests, unsupported content types and unknown status codes.
 */
export class RequestError extends ApiError {
  /** RequestError error-name */
  name = 'RequestError';
}

/**
 * Type guard for {@link RequestError}.
 */
export function isRequestError(error: unknown): error is RequestError {
  return isErrorType(RequestError, error);
}

/**
 * Extract a {@link RequestError} from an unknown error value, following nested causes.
 */
export function getRequestError(error: unknown): null | RequestError {
  return unwrapErrorType(RequestError, error);
}
