import { z } from 'zod';
import type { RequestDefaults } from '../types/request.js';
import { validator } from '../utils/validator.js';

/** Request defaults applied when neither the client nor the call sets a value. */
export const DEFAULT_REQUEST_OPTS: RequestDefaults = {
  pageSize: 1000,
  concurrency: 5,
  holdDuration: 1000,
  timeout: 300_000,
  checkCache: true,
  zeroCount: 'error',
  zeroCountStage: 'probe',
  holdAfterLastChunk: true,
};

/** Default path of the REST API beneath the server root. */
export const DEFAULT_API_PATH = '/webacs/api/v1/';

/** Default query key of the scope filter. */
export const DEFAULT_SCOPE_KEY = '_ctx.domain';

/** Schema of fully merged request options. */
export const requestDefaultsSchema = z.object({
  pageSize: z.number().int().positive(),
  concurrency: z.number().int().positive(),
  holdDuration: z.number().nonnegative(),
  timeout: z.number().nonnegative(),
  checkCache: z.boolean(),
  zeroCount: z.enum(['error', 'empty']),
  zeroCountStage: z.enum(['probe', 'classifier']),
  holdAfterLastChunk: z.boolean(),
});

/**
 * Merges option layers left to right; `undefined` values never override.
 */
export function mergeOptionLayers(...layers: Array<object | undefined>): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer ?? {})) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

/**
 * Merges option layers over {@link DEFAULT_REQUEST_OPTS} and validates the result.
 */
export function resolveRequestOptions(...layers: Array<object | undefined>) {
  return validator(mergeOptionLayers(DEFAULT_REQUEST_OPTS, ...layers), requestDefaultsSchema, 'request options');
}
