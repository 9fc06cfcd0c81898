import { Agent, fetch as undiciFetch } from 'undici';
import type {
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchFunction,
  FetchResponse,
  HttpMethod,
  TransportOptions,
} from '../types/request.js';
import { buildUrl, withTrailingSlash } from '../utils/buildUrl.js';
import { type Logger, noopLogger } from '../utils/logger.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { basicAuthorization, mergeHeaderOptions } from './utils.js';

/** Headers sent with every call unless overridden. */
const DEFAULT_HEADERS = { accept: 'application/json' };

/** undici's fetch, narrowed to the transport's call shape. */
const defaultFetch: FetchFunction = (url, init) => undiciFetch(url, init);

/**
 * Thin transport over `fetch` that:
 * - resolves request paths against the API base URL and appends query params,
 * - sends `Accept: application/json` and HTTP Basic credentials,
 * - never follows redirects and never keeps connections alive,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Responses are handed back whatever their status; classifying them is the caller's job.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL relative paths resolve against. */
  #baseUrl: string;
  /** Default headers and credentials. */
  #opts: FetchClientOptions;
  /** Fetch implementation. */
  #fetch: FetchFunction;
  /** Connection pool for undici's fetch, created on first use; a custom fetch never gets one. */
  #agent: Agent | null = null;
  /** Whether the pool has been closed. */
  #closed = false;
  /** Logger for transport failures. */
  #logger: Logger;

  /** Creates a new transport for the API base URL. */
  constructor(baseUrl: string, opts: FetchClientOptions = {}) {
    this.#baseUrl = withTrailingSlash(baseUrl);
    this.#opts = opts;
    this.#fetch = opts.fetch ?? defaultFetch;
    this.#logger = opts.logger ?? noopLogger;
  }

  /** Base URL relative paths resolve against. */
  get baseUrl(): string {
    return this.#baseUrl;
  }

  /**
   * Updates default headers and credentials (headers are merged with existing ones).
   */
  public config(opts: Pick<FetchClientOptions, 'headers' | 'username' | 'password'>) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Executes a GET request.
   *
   * @param url - Absolute URL, or a path relative to the base URL.
   * @param opts - Query params, extra headers and abort signal.
   */
  public get(url: string, opts: Omit<TransportOptions, 'body'> = {}): SafeWrapAsync<Error, FetchResponse> {
    return this.request('GET', url, opts);
  }

  /**
   * Executes a request with any method.
   *
   * Errors:
   * - An unbuildable URL yields a `ConstructURLError`.
   * - Network failures and aborts yield an `Error` with the failure as `cause`;
   *   an aborted call carries the signal's reason as `cause`.
   */
  public async request(
    method: HttpMethod,
    url: string,
    opts: TransportOptions = {},
  ): SafeWrapAsync<Error, FetchResponse> {
    if (this.#closed) {
      return [new Error(`error in ${method} request, transport is disposed`), null];
    }

    const [errUrl, target] = buildUrl(this.#baseUrl, url, opts.params);
    if (errUrl) {
      return [errUrl, null];
    }

    const headers = mergeHeaderOptions(DEFAULT_HEADERS, this.#authorization(), this.#opts.headers, opts.headers);

    const [err, res] = await safeWrapAsync(() =>
      this.#fetch(target, {
        method,
        headers,
        redirect: 'manual',
        ...this.#dispatcher(),
        ...(opts.body !== undefined && { body: opts.body }),
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      const cause = opts.signal?.aborted ? opts.signal.reason : err;
      this.#logger.debug('transport call failed', { method, url: target, error: err.message });
      return [new Error(`error in ${method} request to ${target}`, { cause }), null];
    }

    return [null, res];
  }

  /**
   * Closes pooled connections; further calls fail.
   */
  public async dispose(): Promise<void> {
    if (this.#closed) {
      return;
    }

    this.#closed = true;
    await this.#agent?.close();
  }

  /** Dispatcher layer of the fetch init: keep-alive off and TLS verification per options. */
  #dispatcher(): { dispatcher?: Agent } {
    if (this.#fetch !== defaultFetch) {
      return {};
    }

    if (this.#agent === null) {
      this.#agent = new Agent({
        pipelining: 0,
        connect: { rejectUnauthorized: this.#opts.verifyTLS ?? true },
      });
    }
    return { dispatcher: this.#agent };
  }

  /** Authorization header layer for the configured credentials. */
  #authorization(): Record<string, string> {
    const { username, password } = this.#opts;
    if (username === undefined) {
      return {};
    }

    return { authorization: basicAuthorization(username, password ?? '') };
  }
}
