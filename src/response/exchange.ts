import { CancelledError } from '../error/cancelledError.js';
import { TimeoutError } from '../error/timeoutError.js';
import type { FetchClientProviderDefinition, HeaderOptions, HttpMethod } from '../types/request.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type ClassifyOptions, classifyResponse } from './classify.js';

/** One HTTP call and the context its response is classified in. */
export interface ExchangeOptions extends ClassifyOptions {
  /** @default 'GET' */
  method?: HttpMethod;
  /** Serialized body. */
  body?: string;
  /** Headers merged over the transport defaults. */
  headers?: HeaderOptions;
  /** Caller signal; aborting it yields a {@link CancelledError}. */
  signal?: AbortSignal;
  /** Timeout of this single call in milliseconds; expiry yields a {@link TimeoutError}. */
  timeout?: number | false;
}

/**
 * Maps an aborted call to the error of whichever signal fired, or `null` when neither did.
 */
function abortedWith(signal: AbortSignal | undefined, timeoutSignal: AbortSignal | undefined): Error | null {
  if (timeoutSignal?.aborted) {
    const reason: unknown = timeoutSignal.reason;
    return reason instanceof TimeoutError ? reason : new TimeoutError('error request timed out', 0, { cause: reason });
  }

  if (signal?.aborted) {
    const reason: unknown = signal.reason;
    return reason instanceof CancelledError ? reason : new CancelledError('error request cancelled', { cause: reason });
  }

  return null;
}

/**
 * Sends one request to an absolute URL and classifies its response.
 *
 * The call runs under its own timeout, linked with the caller's signal; the
 * timer is cleared once the response body has been read and classified.
 */
export async function exchange(
  transport: FetchClientProviderDefinition,
  opts: ExchangeOptions,
): SafeWrapAsync<Error, unknown> {
  const { method = 'GET', url, signal } = opts;
  if (signal?.aborted) {
    return [abortedWith(signal, undefined) ?? new CancelledError('error request cancelled'), null];
  }

  const timeout = createTimeoutSignal(opts.timeout);
  const merged = mergeSignals([signal, timeout?.signal]);

  try {
    const [errFetch, response] = await transport.request(method, url, {
      body: opts.body,
      headers: opts.headers,
      ...(merged && { signal: merged.signal }),
    });
    if (errFetch) {
      return [abortedWith(signal, timeout?.signal) ?? errFetch, null];
    }

    const [errClassify, body] = await classifyResponse(response, opts);
    if (errClassify) {
      return [abortedWith(signal, timeout?.signal) ?? errClassify, null];
    }

    return [null, body];
  } finally {
    timeout?.clear();
    merged?.dispose();
  }
}
