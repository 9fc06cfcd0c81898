/** Request context attached to errors raised for an HTTP exchange. */
export interface ApiErrorContext {
  /** URL that was requested. */
  url: string;
  /** HTTP status of the response, or `null` when no response was classified. */
  status?: number | null;
}

/**
 * Base class for errors raised while classifying a response from the API.
 */
export class ApiError extends Error {
  /** ApiError error-name */
  name = 'ApiError';
  /** Internal URL of the failing request */
  #url: string;
  /** Internal HTTP status of the failing response */
  #status: number | null;

  /** Creates a new instance of an ApiError with the failing request context */
  constructor(message: string, context: ApiErrorContext, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = context.url;
    this.#status = context.status ?? null;
  }

  /** URL of the failing request */
  get url(): string {
    return this.#url;
  }

  /** HTTP status of the failing response */
  get status(): number | null {
    return this.#status;
  }
}
