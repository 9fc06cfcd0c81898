import { ConstructURLError } from '../error/constructUrlError.js';
import type { QueryParams } from '../types/request.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Resolves `path` against `base` and appends `params` as a query string, in insertion order.
 *
 * An absolute `path` replaces the base entirely; a relative one is resolved
 * against it, so `base` should end with `/`.
 */
export function buildUrl(base: string, path: string, params?: QueryParams): SafeWrap<ConstructURLError, string> {
  const [errUrl, url] = safeWrap(() => new URL(path, base));
  if (errUrl) {
    return [new ConstructURLError(`error constructing URL from ${path} against ${base}`, { base, path }, { cause: errUrl }), null];
  }

  for (const [key, value] of Object.entries(params ?? {})) {
    if (value === undefined || value === null) {
      continue;
    }
    url.searchParams.set(key, String(value));
  }

  return [null, url.toString()];
}

/**
 * Ensures a base URL ends with a single trailing slash so relative paths resolve beneath it.
 */
export function withTrailingSlash(base: string): string {
  return base.endsWith('/') ? base : `${base}/`;
}
