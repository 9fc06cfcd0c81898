import { ApiError, type ApiErrorContext } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a data query matches zero records.
 */
export class NoResultError extends ApiError {
  /** NoResultError error-name */
  name = 'NoResultError';
  /** Internal query parameters of the empty query */
  #params: Readonly<Record<string, unknown>>;

  /** Creates a new instance of a NoResultError with the query that matched nothing */
  constructor(
    message: string,
    context: ApiErrorContext & { params?: Readonly<Record<string, unknown>> },
    opts?: ErrorOptions,
  ) {
    super(message, context, opts);
    this.#params = context.params ?? {};
  }

  /** Query parameters of the empty query */
  get params(): Readonly<Record<string, unknown>> {
    return this.#params;
  }
}

/**
 * Type guard for {@link NoResultError}.
 */
export function isNoResultError(error: unknown): error is NoResultError {
  return isErrorType(NoResultError, error);
}

/**
 * Extract a {@link NoResultError} from an unknown error value, following nested causes.
 */
export function getNoResultError(error: unknown): null | NoResultError {
  return unwrapErrorType(NoResultError, error);
}
