import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a single HTTP call exceeds its configured timeout.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  name = 'TimeoutError';
  /** Internal timeout that expired, in milliseconds */
  #timeout: number;

  /** Creates a new instance of a TimeoutError with the timeout that expired */
  constructor(message: string, timeout: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#timeout = timeout;
  }

  /** Timeout that expired, in milliseconds */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
