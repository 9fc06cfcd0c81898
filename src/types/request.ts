import type { Dispatcher } from 'undici';
import type { Logger } from '../utils/logger.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Value allowed in a query string parameter. */
export type QueryValue = string | number | boolean;

/** Query parameters of a request, serialized in insertion order. */
export type QueryParams = Readonly<Record<string, QueryValue>>;

/** Header options accepted by the transport; `null` removes a default header. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null | undefined>;

/** HTTP verbs a service resource can be invoked with. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

/**
 * Response shape the client reads. Global, undici and Hono `Response` objects all satisfy it.
 */
export interface FetchResponse {
  readonly status: number;
  readonly url: string;
  readonly headers: { get(name: string): string | null };
  text(): Promise<string>;
}

/** Fully resolved options handed to the fetch function for one call. */
export interface FetchInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
  /** Redirects are never followed, so a login redirect surfaces as 302. */
  redirect: 'manual';
  /** Connection pool the call runs on, when the fetch function is undici's. */
  dispatcher?: Dispatcher;
}

/** Fetch implementation used by the transport. Defaults to undici's `fetch`. */
export type FetchFunction = (url: string, init: FetchInit) => Promise<FetchResponse>;

/** Options for one transport call. */
export interface TransportOptions {
  /** Query parameters appended to the URL. */
  params?: QueryParams;
  /** Serialized body. */
  body?: string;
  /** Headers merged over the transport defaults. */
  headers?: HeaderOptions;
  /** Signal aborting the call. */
  signal?: AbortSignal;
}

/** Options to configure a transport. */
export interface FetchClientOptions {
  /** User for HTTP Basic authentication. */
  username?: string;
  /** Password for HTTP Basic authentication. */
  password?: string;
  /** Default headers sent with every call. */
  headers?: HeaderOptions;
  /**
   * Whether to verify the server's TLS certificate.
   * @default true
   */
  verifyTLS?: boolean;
  /** Custom fetch implementation. */
  fetch?: FetchFunction;
  /** Logger for transport failures. */
  logger?: Logger;
}

/** Contract for HTTP transports used by the client. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options?: Omit<TransportOptions, 'body'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Executes a request with any method. */
  request: (method: HttpMethod, url: string, options?: TransportOptions) => SafeWrapAsync<Error, FetchResponse>;
  /** Updates default headers and credentials. */
  config: (opts: Pick<FetchClientOptions, 'headers' | 'username' | 'password'>) => void;
  /** Releases pooled connections. */
  dispose?: () => Promise<void>;
}

/** Factory signature for constructing HTTP transports. */
export interface FetchClientProvider {
  /** Creates a new transport for an API base URL. */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}

/** Behaviour when a data query matches zero records. */
export type ZeroCountPolicy = 'error' | 'empty';

/** Where a zero count is detected: on the count probe, or already in the classifier. */
export type ZeroCountStage = 'probe' | 'classifier';

/** Options controlling a paged bulk fetch. */
export interface BatchOptions {
  /**
   * Records per page.
   * @default 1000
   */
  pageSize: number;
  /**
   * Pages fetched concurrently in one chunk.
   * @default 5
   */
  concurrency: number;
  /**
   * Pause after each chunk, in milliseconds.
   * @default 1000
   */
  holdDuration: number;
  /**
   * Timeout of each single HTTP call, in milliseconds.
   * @default 300000
   */
  timeout: number;
  /** @default 'error' */
  zeroCount: ZeroCountPolicy;
  /** @default 'probe' */
  zeroCountStage: ZeroCountStage;
  /**
   * Whether the pause also follows the final chunk.
   * @default true
   */
  holdAfterLastChunk: boolean;
}

/** Request defaults configurable on the client. */
export interface RequestDefaults extends BatchOptions {
  /**
   * Serve repeated data queries from the in-memory cache.
   * `false` always fetches live and refreshes the entry.
   * @default true
   */
  checkCache: boolean;
}

/** Options accepted by a single request; each overrides the client default. */
export interface RequestOptions extends Partial<RequestDefaults> {
  /** Scope filter injected into the query; overrides the client-level domain. */
  domain?: string;
  /** Signal cancelling the request. */
  signal?: AbortSignal;
}

/**
 * Runtime configuration payload accepted by `ApiClient.config`.
 */
export interface Config {
  /** Default headers and credentials of the transport. */
  fetchOpts?: Pick<FetchClientOptions, 'headers' | 'username' | 'password'>;
  /** Request defaults. */
  requestOpts?: Partial<RequestDefaults>;
  /** Client-level scope filter; `null` removes it. */
  domain?: string | null;
}
