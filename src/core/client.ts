import { FingerprintCache } from '../cache/client.js';
import { type DataResource, ResourceCatalog, type ServiceResource } from '../catalog/client.js';
import { CancelledError } from '../error/cancelledError.js';
import { FetchClient } from '../fetch/client.js';
import { BatchFetcher } from '../pagination/fetcher.js';
import { exchange } from '../response/exchange.js';
import type {
  Config,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchFunction,
  HeaderOptions,
  QueryParams,
  RequestDefaults,
  RequestOptions,
} from '../types/request.js';
import { buildUrl, withTrailingSlash } from '../utils/buildUrl.js';
import { createConsoleLogger, type Logger, noopLogger } from '../utils/logger.js';
import { mergeSignals } from '../utils/signals.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import {
  DEFAULT_API_PATH,
  DEFAULT_REQUEST_OPTS,
  DEFAULT_SCOPE_KEY,
  mergeOptionLayers,
  resolveRequestOptions,
} from './options.js';

/** Configuration for constructing an {@link ApiClient}. */
export interface ApiClientProps {
  /** Server root (e.g. `https://prime.example.com`). */
  baseUrl: string;
  /**
   * Path of the REST API beneath the server root.
   * @default '/webacs/api/v1/'
   */
  apiPath?: string;
  /** User for HTTP Basic authentication. */
  username: string;
  /** Password for HTTP Basic authentication. */
  password: string;
  /**
   * Whether to verify the server's TLS certificate.
   * @default true
   */
  verifyTLS?: boolean;
  /** Scope filter (virtual domain) injected into every request. */
  domain?: string;
  /**
   * Query key the scope filter is sent under.
   * @default '_ctx.domain'
   */
  scopeKey?: string;
  /** Extra headers sent with every request. */
  headers?: HeaderOptions;
  /** HTTP transport implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Custom fetch function handed to the transport. */
  fetch?: FetchFunction;
  /** Logger; defaults to a no-op logger, or a console logger with `debug`. */
  logger?: Logger;
  /** Log to the console when no `logger` is given. */
  debug?: boolean;
  /** Request defaults; see {@link RequestDefaults}. */
  requestOpts?: Partial<RequestDefaults>;
}

/** Joins the server root and API path into a base URL ending with `/`. */
function joinApiBase(baseUrl: string, apiPath: string): string {
  return withTrailingSlash(`${baseUrl.replace(/\/+$/, '')}/${apiPath.replace(/^\/+/, '')}`);
}

/**
 * Client for a paginated, rate-limited REST API that:
 * - discovers data and service resources lazily from the API's catalogs,
 * - reads data resources in paced, concurrency-capped page batches,
 * - memoizes completed data queries by fingerprint,
 * - invokes service resources with a single call.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 */
export class ApiClient {
  /** Underlying HTTP transport. */
  #fetchClient: FetchClientProviderDefinition;
  /** Lazily loaded resource catalog. */
  #catalog: ResourceCatalog;
  /** Paged bulk reader. */
  #fetcher: BatchFetcher;
  /** Completed data queries by fingerprint. */
  #cache: FingerprintCache = new FingerprintCache();
  /** Client-level request option overrides. */
  #requestOpts: Record<string, unknown>;
  /** Client-level scope filter. */
  #domain: string | null;
  /** Query key of the scope filter. */
  #scopeKey: string;
  #logger: Logger;
  /** Global abort-controller for disposing */
  #abortController: AbortController = new AbortController();

  /**
   * Creates a client; nothing is requested until the first call.
   */
  constructor({
    baseUrl,
    apiPath = DEFAULT_API_PATH,
    username,
    password,
    verifyTLS = true,
    domain,
    scopeKey = DEFAULT_SCOPE_KEY,
    headers,
    fetchProvider = FetchClient,
    fetch,
    logger,
    debug = false,
    requestOpts,
  }: ApiClientProps) {
    const apiBaseUrl = joinApiBase(baseUrl, apiPath);

    this.#logger = logger ?? (debug ? createConsoleLogger() : noopLogger);
    this.#domain = domain ?? null;
    this.#scopeKey = scopeKey;
    this.#requestOpts = mergeOptionLayers(requestOpts);
    this.#fetchClient = new fetchProvider(apiBaseUrl, {
      username,
      password,
      verifyTLS,
      headers,
      fetch,
      logger: this.#logger,
    });
    this.#catalog = new ResourceCatalog(this.#fetchClient, apiBaseUrl, {
      logger: this.#logger,
      signal: this.#abortController.signal,
      timeout: () => {
        const { timeout } = this.#requestOpts;
        return typeof timeout === 'number' ? timeout : DEFAULT_REQUEST_OPTS.timeout;
      },
    });
    this.#fetcher = new BatchFetcher(this.#fetchClient, { logger: this.#logger });
  }

  /**
   * Updates transport, request and scope defaults at runtime.
   */
  config(opts: Config) {
    if (opts.fetchOpts) {
      this.#fetchClient.config(opts.fetchOpts);
    }

    if (opts.requestOpts) {
      this.#requestOpts = mergeOptionLayers(this.#requestOpts, opts.requestOpts);
    }

    if (opts.domain !== undefined) {
      this.#domain = opts.domain;
    }
  }

  /**
   * Cancels in-flight work, clears the cache and releases pooled connections.
   * Calls made afterwards fail with a {@link CancelledError}.
   */
  async dispose(): Promise<void> {
    this.#abortController.abort(new CancelledError('error client was disposed'));
    this.#cache.clear();
    await this.#fetchClient.dispose?.();
  }

  /**
   * Requests a resource by name: data resources are read in full, service
   * resources are invoked once.
   *
   * Errors:
   * - An unknown name yields a `ResourceNotFoundError`.
   * - Invalid options yield a `ValidationError` before anything is sent.
   * - HTTP failures yield the typed error of the failing response.
   */
  async request(name: string, params: QueryParams = {}, opts: RequestOptions = {}): SafeWrapAsync<Error, unknown> {
    const [errOpts, options] = await this.#options(opts);
    if (errOpts) {
      return [errOpts, null];
    }

    const [err, resource] = await this.#catalog.resolve(name);
    if (err) {
      return [err, null];
    }

    if (resource.kind === 'data') {
      return this.#fetchData(resource, params, opts, options);
    }

    return this.#callService(resource, params, opts, options);
  }

  /**
   * Reads every record of a data resource, from the cache when possible.
   *
   * @param name - Data resource name, see {@link ApiClient.dataResources}.
   * @param params - Filters and sorting sent with every page.
   */
  async requestData(
    name: string,
    params: QueryParams = {},
    opts: RequestOptions = {},
  ): SafeWrapAsync<Error, unknown[]> {
    const [errOpts, options] = await this.#options(opts);
    if (errOpts) {
      return [errOpts, null];
    }

    const [err, resource] = await this.#catalog.resolve(name, 'data');
    if (err) {
      return [err, null];
    }

    return this.#fetchData(resource, params, opts, options);
  }

  /**
   * Invokes a service resource with a single call.
   *
   * GET sends `params` as query string, POST and PUT as a JSON body, other
   * methods as a form-encoded body.
   */
  async requestService(name: string, params: QueryParams = {}, opts: RequestOptions = {}): SafeWrapAsync<Error, unknown> {
    const [errOpts, options] = await this.#options(opts);
    if (errOpts) {
      return [errOpts, null];
    }

    const [err, resource] = await this.#catalog.resolve(name, 'service');
    if (err) {
      return [err, null];
    }

    return this.#callService(resource, params, opts, options);
  }

  /** Names of all data resources. */
  async dataResources(): SafeWrapAsync<Error, string[]> {
    const [err, snapshot] = await this.#catalog.ensureLoaded();
    if (err) {
      return [err, null];
    }
    return [null, [...snapshot.data.keys()]];
  }

  /** Names of all service resources. */
  async serviceResources(): SafeWrapAsync<Error, string[]> {
    const [err, snapshot] = await this.#catalog.ensureLoaded();
    if (err) {
      return [err, null];
    }
    return [null, [...snapshot.services.keys()]];
  }

  /** Names of all resources, data resources first. */
  async resources(): SafeWrapAsync<Error, string[]> {
    const [err, snapshot] = await this.#catalog.ensureLoaded();
    if (err) {
      return [err, null];
    }
    return [null, [...snapshot.data.keys(), ...snapshot.services.keys()]];
  }

  /** Reads a data resource through the cache and the batch fetcher. */
  async #fetchData(
    resource: DataResource,
    params: QueryParams,
    { signal, domain }: RequestOptions,
    options: RequestDefaults,
  ): SafeWrapAsync<Error, unknown[]> {
    const scoped = this.#scope(params, domain);
    const fingerprint = this.#cache.fingerprint(resource.name, scoped);
    if (options.checkCache && this.#cache.has(fingerprint)) {
      this.#logger.debug('cache hit', { resource: resource.name, fingerprint });
    }

    return this.#cache.load(
      fingerprint,
      async (loadSignal) => {
        // Shared between callers; cancelled by dispose or once every waiter has left.
        const merged = mergeSignals([this.#abortController.signal, loadSignal]);
        try {
          return await this.#fetcher.fetch(resource.url, scoped, { ...options, ...(merged && { signal: merged.signal }) });
        } finally {
          merged?.dispose();
        }
      },
      { refresh: !options.checkCache, signal },
    );
  }

  /** Invokes a service resource with one call. */
  async #callService(
    resource: ServiceResource,
    params: QueryParams,
    { signal, domain }: RequestOptions,
    options: RequestDefaults,
  ): SafeWrapAsync<Error, unknown> {
    const scoped = this.#scope(params, domain);
    const sendsQuery = resource.method === 'GET';
    const [errUrl, url] = buildUrl(resource.url, '', sendsQuery ? scoped : undefined);
    if (errUrl) {
      return [errUrl, null];
    }

    const merged = mergeSignals([this.#abortController.signal, signal]);
    try {
      return await exchange(this.#fetchClient, {
        method: resource.method,
        url,
        timeout: options.timeout,
        ...(merged && { signal: merged.signal }),
        ...(!sendsQuery && encodeServiceBody(resource.method, scoped)),
      });
    } finally {
      merged?.dispose();
    }
  }

  /** Merges client defaults with the call's overrides and validates them; `signal` and `domain` are dropped. */
  #options(opts: RequestOptions): SafeWrapAsync<Error, RequestDefaults> {
    return resolveRequestOptions(this.#requestOpts, opts);
  }

  /** Copy of `params` with the scope filter injected, when one applies. */
  #scope(params: QueryParams, domain: string | undefined): QueryParams {
    const scope = domain ?? this.#domain;
    return scope ? { ...params, [this.#scopeKey]: scope } : params;
  }
}

/**
 * Body and content type of a service call: JSON for POST and PUT, form-encoded otherwise.
 */
function encodeServiceBody(method: string, params: QueryParams): { body: string; headers: Record<string, string> } {
  if (method === 'POST' || method === 'PUT') {
    return { body: JSON.stringify(params), headers: { 'Content-Type': 'application/json' } };
  }

  const form = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    form.set(key, String(value));
  }
  return { body: form.toString(), headers: { 'Content-Type': 'application/x-www-form-urlencoded' } };
}
