/**
 * Core entrypoint: exports the API client and its option types.
 * Import from here if you only need the client without error helpers.
 * @module
 */

/** Constructor options accepted by {@link ApiClient}. */
export type { ApiClientProps } from './client.js';

/**
 * Client for a paginated, rate-limited REST API: lazy resource discovery,
 * paced bulk reads of data resources and single-shot service calls.
 */
export { ApiClient } from './client.js';

/** Request defaults applied when neither the client nor the call sets a value. */
export { DEFAULT_API_PATH, DEFAULT_REQUEST_OPTS, DEFAULT_SCOPE_KEY } from './options.js';

export type {
  BatchOptions,
  Config,
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchFunction,
  FetchInit,
  FetchResponse,
  HeaderOptions,
  HttpMethod,
  QueryParams,
  QueryValue,
  RequestDefaults,
  RequestOptions,
  ZeroCountPolicy,
  ZeroCountStage,
} from '../types/request.js';
