/**
 * Root entrypoint: re-exports the client, its building blocks, types and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './core/index.js';
export * from './error/index.js';

/** In-memory memo of completed bulk fetches keyed by query fingerprint. */
export { computeFingerprint, FingerprintCache, type LoadOptions } from './cache/client.js';

/** Lazily loaded catalog of data and service resources. */
export {
  type CatalogSnapshot,
  type DataResource,
  type ResourceDescriptor,
  ResourceCatalog,
  type ResourceCatalogOptions,
  type ServiceResource,
} from './catalog/client.js';

/** Default HTTP transport. */
export { FetchClient } from './fetch/client.js';

/** Paced bulk reader and its paging helpers. */
export {
  BatchFetcher,
  chunkPages,
  type FetchOptions,
  type PageRequest,
  pageParams,
  partitionPages,
} from './pagination/fetcher.js';

/** Response classification. */
export { type ClassifyOptions, classifyResponse } from './response/classify.js';

/** Structured logging. */
export { createConsoleLogger, type Logger, noopLogger } from './utils/logger.js';

/** Tuple-style results. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
