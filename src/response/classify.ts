import type { ApiErrorContext } from '../error/apiError.js';
import { AuthError } from '../error/authError.js';
import { NoResultError } from '../error/noResultError.js';
import { NotFoundError } from '../error/notFoundError.js';
import { RequestError } from '../error/requestError.js';
import { ServerError } from '../error/serverError.js';
import type { FetchResponse, QueryParams, ZeroCountPolicy, ZeroCountStage } from '../types/request.js';
import { getResponseData } from '../utils/getResponseData.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { errorMessageSchema, queryEnvelopeSchema } from './envelope.js';

/** Context a response is classified in. */
export interface ClassifyOptions {
  /** URL that was requested, echoed in errors. */
  url: string;
  /** Whether the response answers a data query, enabling the zero-count check. */
  dataQuery?: boolean;
  /** Query parameters, attached to a {@link NoResultError}. */
  params?: QueryParams;
  /** @default 'error' */
  zeroCount?: ZeroCountPolicy;
  /** @default 'probe' */
  zeroCountStage?: ZeroCountStage;
}

/** Hint attached to 502/503 responses. */
const OVERLOAD_HINT = 'the server may be down for maintenance or overloaded (rate limited)';

/**
 * Classifies a response into its decoded body or a typed error.
 *
 * Every status maps to exactly one outcome:
 * - `200` yields the decoded body; with the classifier zero-count stage, a data
 *   query whose envelope counts zero records yields a {@link NoResultError}.
 * - `302`, `401`, `403` yield an {@link AuthError}.
 * - `400`, `406`, `415` and any unlisted status yield a {@link RequestError}.
 * - `404` yields a {@link NotFoundError}.
 * - `500`, `502`, `503` yield a {@link ServerError}; `502`/`503` are `transient`.
 */
export async function classifyResponse(response: FetchResponse, opts: ClassifyOptions): SafeWrapAsync<Error, unknown> {
  const { url } = opts;
  const context: ApiErrorContext = { url, status: response.status };
  const [errBody, body] = await getResponseData(response);

  switch (response.status) {
    case 200: {
      if (errBody) {
        return [new RequestError(`error decoding response from ${url}`, context, { cause: errBody }), null];
      }
      if (opts.dataQuery && opts.zeroCountStage === 'classifier' && (opts.zeroCount ?? 'error') === 'error') {
        const [, envelope] = await validator(body, queryEnvelopeSchema, 'query envelope');
        if (envelope && envelope.count !== null && envelope.count <= 0) {
          return [new NoResultError(`no results found for ${url}`, { ...context, params: opts.params }), null];
        }
      }
      return [null, body];
    }
    case 302:
      return [new AuthError('incorrect credentials provided', context), null];
    case 400: {
      const [, message] = await validator(body, errorMessageSchema, 'error document');
      return [new RequestError(message ?? `invalid request ${url}`, context), null];
    }
    case 401:
      return [new AuthError(`unauthorized access to ${url}`, context), null];
    case 403:
      return [new AuthError(`forbidden access to ${url}`, context), null];
    case 404:
      return [new NotFoundError(`resource not found at ${url}`, context), null];
    case 406:
      return [new RequestError(`not acceptable, the server cannot produce json for ${url}`, context), null];
    case 415:
      return [new RequestError(`unsupported media type sent to ${url}`, context), null];
    case 500:
      return [new ServerError(`internal server error at ${url}`, context), null];
    case 502:
      return [new ServerError(`bad gateway at ${url}, ${OVERLOAD_HINT}`, context), null];
    case 503:
      return [new ServerError(`service unavailable at ${url}, ${OVERLOAD_HINT}`, context), null];
    default:
      return [new RequestError(`unknown request error, return code is ${response.status}`, context), null];
  }
}
