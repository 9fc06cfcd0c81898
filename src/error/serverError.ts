import { ApiError } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Status codes the API answers with while down for maintenance or overloaded. */
const TRANSIENT_STATUS_CODES: ReadonlyArray<number> = [502, 503];

/**
 * Error raised when the API fails internally, is being upgraded or is overloaded.
 */
export class ServerError extends ApiError {
  /** ServerError error-name */
  name = 'ServerError';

  /**
   * Whether the server reported a condition that goes away on its own
   * (maintenance or rate limiting), so that a later attempt may succeed.
   */
  get transient(): boolean {
    return this.status !== null && TRANSIENT_STATUS_CODES.includes(this.status);
  }
}

/**
 * Type guard for {@link ServerError}.
 */
export function isServerError(error: unknown): error is ServerError {
  return isErrorType(ServerError, error);
}

/**
 * Extract a {@link ServerError} from an unknown error value, following nested causes.
 */
export function getServerError(error: unknown): null | ServerError {
  return unwrapErrorType(ServerError, error);
}
