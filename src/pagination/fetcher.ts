import { CancelledError } from '../error/cancelledError.js';
import { NoResultError } from '../error/noResultError.js';
import { ValidationError } from '../error/validationError.js';
import { queryEnvelopeSchema } from '../response/envelope.js';
import { exchange } from '../response/exchange.js';
import type { BatchOptions, FetchClientProviderDefinition, QueryParams } from '../types/request.js';
import { buildUrl } from '../utils/buildUrl.js';
import { type Logger, noopLogger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { validator } from '../utils/validator.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';

/** Options of one bulk fetch. */
export interface FetchOptions extends BatchOptions {
  /** Signal cancelling the fetch: in-flight pages abort and later chunks are skipped. */
  signal?: AbortSignal;
}

/** Derived unit of work: one HTTP call for one page. */
export interface PageRequest {
  /** Position of the page in offset order. */
  index: number;
  /** Absolute URL including the page's query string. */
  url: string;
  params: QueryParams;
  timeout: number;
}

/**
 * Start offsets of the pages covering `count` records: `0, pageSize, ...` while below `count`.
 */
export function partitionPages(count: number, pageSize: number): number[] {
  const offsets: number[] = [];
  for (let offset = 0; offset < count; offset += pageSize) {
    offsets.push(offset);
  }
  return offsets;
}

/**
 * Splits items into consecutive chunks of at most `size`.
 */
export function chunkPages<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

/**
 * Copy of `params` with the paging keys added, overriding any the caller set.
 */
export function pageParams(params: QueryParams, offset: number, pageSize: number): QueryParams {
  return { ...params, '.full': true, '.firstResult': offset, '.maxResults': pageSize };
}

/**
 * Paced bulk reader for paginated data resources.
 *
 * A fetch probes the record count, partitions it into pages and requests the
 * pages in chunks of at most `concurrency` parallel calls, pausing
 * `holdDuration` ms after each chunk. The first failing page fails the whole
 * fetch; nothing is retried and no partial result is returned.
 */
export class BatchFetcher {
  #transport: FetchClientProviderDefinition;
  #logger: Logger;

  /** Creates a fetcher issuing its calls through `transport`. */
  constructor(transport: FetchClientProviderDefinition, opts: { logger?: Logger } = {}) {
    this.#transport = transport;
    this.#logger = opts.logger ?? noopLogger;
  }

  /**
   * Fetches every record of a data resource.
   *
   * @param url - Absolute URL of the data resource.
   * @param baseParams - Query parameters; never mutated.
   * @returns All page entities concatenated in ascending offset order.
   */
  public async fetch(url: string, baseParams: QueryParams, opts: FetchOptions): SafeWrapAsync<Error, unknown[]> {
    const { signal } = opts;

    const [errCount, count] = await this.#probe(url, baseParams, opts);
    if (errCount) {
      return [errCount, null];
    }

    if (count <= 0) {
      if (opts.zeroCount === 'empty') {
        return [null, []];
      }
      return [
        new NoResultError(`no results found for ${url}`, { url, status: 200, params: baseParams }),
        null,
      ];
    }

    const [errPages, pages] = this.#pageRequests(url, baseParams, count, opts);
    if (errPages) {
      return [errPages, null];
    }

    const chunks = chunkPages(pages, opts.concurrency);
    const results: unknown[][] = [];

    for (const [chunkIndex, chunk] of chunks.entries()) {
      this.#logger.debug('dispatching chunk', {
        url,
        chunk: chunkIndex + 1,
        chunks: chunks.length,
        pages: chunk.map((page) => page.index),
      });

      const settled = await Promise.all(chunk.map((page) => this.#page(page, signal)));
      if (signal?.aborted) {
        return [this.#cancelled(signal), null];
      }

      for (const [errPage, entities] of settled) {
        if (errPage) {
          return [errPage, null];
        }
        results.push(entities);
      }

      const last = chunkIndex === chunks.length - 1;
      if (!last || opts.holdAfterLastChunk) {
        this.#logger.debug('holding after chunk', { url, chunk: chunkIndex + 1, holdDuration: opts.holdDuration });
        await sleep(opts.holdDuration, signal);
        if (signal?.aborted) {
          return [this.#cancelled(signal), null];
        }
      }
    }

    const entities = results.flat();
    if (entities.length !== count) {
      this.#logger.warn('record count mismatch', { url, expected: count, received: entities.length });
    }

    return [null, entities];
  }

  /** Issues the count probe and reads the record count from its envelope. */
  async #probe(url: string, params: QueryParams, opts: FetchOptions): SafeWrapAsync<Error, number> {
    const [errUrl, probeUrl] = buildUrl(url, '', params);
    if (errUrl) {
      return [errUrl, null];
    }

    const [err, body] = await exchange(this.#transport, {
      url: probeUrl,
      signal: opts.signal,
      timeout: opts.timeout,
      dataQuery: true,
      params,
      zeroCount: opts.zeroCount,
      zeroCountStage: opts.zeroCountStage,
    });
    if (err) {
      return [err, null];
    }

    const [errEnvelope, envelope] = await validator(body, queryEnvelopeSchema, 'count probe');
    if (errEnvelope) {
      return [errEnvelope, null];
    }

    if (envelope.count === null) {
      return [new ValidationError(`error reading record count from ${probeUrl}`, []), null];
    }

    this.#logger.debug('count probe', { url, count: envelope.count });
    return [null, envelope.count];
  }

  /** Builds the page requests covering `count` records. */
  #pageRequests(url: string, params: QueryParams, count: number, opts: FetchOptions): SafeWrap<Error, PageRequest[]> {
    const pages: PageRequest[] = [];
    for (const [index, offset] of partitionPages(count, opts.pageSize).entries()) {
      const paged = pageParams(params, offset, opts.pageSize);
      const [errUrl, pageUrl] = buildUrl(url, '', paged);
      if (errUrl) {
        return [errUrl, null];
      }
      pages.push({ index, url: pageUrl, params: paged, timeout: opts.timeout });
    }
    return [null, pages];
  }

  /** Requests one page and returns its entities. */
  async #page(page: PageRequest, signal: AbortSignal | undefined): SafeWrapAsync<Error, unknown[]> {
    const [err, body] = await exchange(this.#transport, {
      url: page.url,
      signal,
      timeout: page.timeout,
      dataQuery: true,
      params: page.params,
    });
    if (err) {
      return [err, null];
    }

    const [errEnvelope, envelope] = await validator(body, queryEnvelopeSchema, `page ${page.index}`);
    if (errEnvelope) {
      return [errEnvelope, null];
    }

    return [null, envelope.entities];
  }

  /** Error reported when the caller cancels mid-fetch. */
  #cancelled(signal: AbortSignal): CancelledError {
    const reason: unknown = signal.reason;
    return reason instanceof CancelledError ? reason : new CancelledError('error fetch cancelled', { cause: reason });
  }
}
