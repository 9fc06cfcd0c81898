import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Kind of resource a name was looked up as. */
export type ResourceKind = 'data' | 'service' | 'any';

/**
 * Error raised when a caller references a resource name the catalog does not know.
 */
export class ResourceNotFoundError extends Error {
  /** ResourceNotFoundError error-name */
  name = 'ResourceNotFoundError';
  /** Internal name that was looked up */
  #resource: string;
  /** Internal kind the name was looked up as */
  #kind: ResourceKind;

  /** Creates a new instance of a ResourceNotFoundError for the unknown name */
  constructor(message: string, resource: string, kind: ResourceKind, opts?: ErrorOptions) {
    super(message, opts);
    this.#resource = resource;
    this.#kind = kind;
  }

  /** Resource name that was not found */
  get resource(): string {
    return this.#resource;
  }

  /** Kind of resource the name was looked up as */
  get kind(): ResourceKind {
    return this.#kind;
  }
}

/**
 * Type guard for {@link ResourceNotFoundError}.
 */
export function isResourceNotFoundError(error: unknown): error is ResourceNotFoundError {
  return isErrorType(ResourceNotFoundError, error);
}

/**
 * Extract a {@link ResourceNotFoundError} from an unknown error value, following nested causes.
 */
export function getResourceNotFoundError(error: unknown): null | ResourceNotFoundError {
  return unwrapErrorType(ResourceNotFoundError, error);
}
