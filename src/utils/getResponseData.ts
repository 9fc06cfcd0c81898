import type { FetchResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Safely extracts and parses the response body into a tuple-style result.
 *
 * Behavior:
 * - 204/205 and empty bodies yield `[null, null]`.
 * - `application/json` and `+json` bodies are parsed; a parse failure yields `[Error, null]`.
 * - Any other body is returned as text.
 *
 * The body is always read through `text()`, since a failed `json()` leaves the
 * stream consumed and the raw text is needed for error messages.
 */
export async function getResponseData(response: FetchResponse): SafeWrapAsync<Error, unknown> {
  // Per HTTP spec, 204 + 205 shouldn't have a body
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text) {
    return [null, null];
  }

  const contentType = response.headers.get('Content-Type')?.toLowerCase();
  if (!contentType?.includes('application/json') && !contentType?.includes('+json')) {
    return [null, text];
  }

  const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, json];
}
