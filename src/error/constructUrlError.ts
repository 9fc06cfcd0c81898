import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Base and path a request URL was resolved from. */
export interface UrlParts {
  base: string;
  path: string;
}

/**
 * Raised when a catalog path or request path does not resolve against the API base.
 */
export class ConstructURLError extends Error {
  name = 'ConstructURLError';
  #parts: UrlParts;

  constructor(message: string, parts: UrlParts, opts?: ErrorOptions) {
    super(message, opts);
    this.#parts = parts;
  }

  /** Base the path was resolved against. */
  get base(): string {
    return this.#parts.base;
  }

  /** Path that failed to resolve, as given by the catalog or the caller. */
  get path(): string {
    return this.#parts.path;
  }
}

/**
 * Extract an {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): null | ConstructURLError {
  return unwrapErrorType(ConstructURLError, error);
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}
