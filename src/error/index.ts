/**
 * Error entrypoint: exports the typed API errors and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Base class of errors raised for an HTTP exchange, exposing `url` and `status`. */
export { ApiError, type ApiErrorContext } from './apiError.js';
/** Rejected credentials, unauthorized or forbidden access. */
export { AuthError, getAuthError, isAuthError } from './authError.js';
/** Caller-initiated abort or client disposal. */
export { CancelledError, isCancelledError } from './cancelledError.js';
/** Resource URL that could not be built. */
export { ConstructURLError, getConstructURLError, isConstructURLError, type UrlParts } from './constructUrlError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Data query that matched zero records. */
export { getNoResultError, isNoResultError, NoResultError } from './noResultError.js';
/** Requested URL does not exist. */
export { getNotFoundError, isNotFoundError, NotFoundError } from './notFoundError.js';
/** Malformed request, unsupported content type or unknown status. */
export { getRequestError, isRequestError, RequestError } from './requestError.js';
/** Resource name unknown to the catalog. */
export {
  getResourceNotFoundError,
  isResourceNotFoundError,
  ResourceNotFoundError,
  type ResourceKind,
} from './resourceNotFoundError.js';
/** Internal error, maintenance or overload on the server. */
export { getServerError, isServerError, ServerError } from './serverError.js';
/** Single HTTP call exceeding its timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Payload or options rejected by schema validation. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
