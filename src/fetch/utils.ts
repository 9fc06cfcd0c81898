import type { HeaderOptions } from '../types/request.js';

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merge header layers into a plain lower-cased record; later layers win and
 * `null`/`undefined` values remove a header set by an earlier layer.
 */
export function mergeHeaderOptions(...layers: Array<HeaderOptions | undefined>): Record<string, string> {
  const merged: Record<string, string> = {};

  for (const [rawKey, value] of layers.flatMap((layer) => [...toEntries(layer)])) {
    const key = rawKey.toLowerCase();
    if (value == null) {
      delete merged[key];
      continue;
    }

    const clean = sanitize(value);
    if (clean !== null) {
      merged[key] = clean;
    }
  }

  return merged;
}

/**
 * Builds an HTTP Basic `Authorization` header value.
 */
export function basicAuthorization(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}
