import { createHash } from 'node:crypto';
import { CancelledError } from '../error/cancelledError.js';
import type { QueryParams } from '../types/request.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Options for a single {@link FingerprintCache.load}. */
export interface LoadOptions {
  /**
   * Skip the cached entry and any shared in-flight load; the fresh result replaces the entry.
   * @default false
   */
  refresh?: boolean;
  /** Cancels this caller's wait; a shared load is aborted once every waiter has cancelled. */
  signal?: AbortSignal;
}

/** Loader started by {@link FingerprintCache.load}; `signal` aborts when no caller waits anymore. */
export type Loader<T> = (signal: AbortSignal) => SafeWrapAsync<Error, T[]>;

/** In-flight load shared by every caller of the same fingerprint. */
interface PendingLoad<T> {
  result: SafeWrapAsync<Error, T[]>;
  controller: AbortController;
  waiters: number;
}

/**
 * Computes the fingerprint of a query: a SHA-256 hex digest over
 * `[resourceName, [[key, String(value)], ...]]` with keys sorted by code unit,
 * so insertion order never changes the result.
 */
export function computeFingerprint(resourceName: string, params: QueryParams = {}): string {
  const entries = Object.entries(params)
    .map(([key, value]) => [key, String(value)] as const)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  return createHash('sha256').update(JSON.stringify([resourceName, entries])).digest('hex');
}

/**
 * In-memory memo of completed bulk fetches keyed by query fingerprint.
 *
 * Entries never expire; they live until {@link FingerprintCache.clear}.
 * Concurrent loads of the same fingerprint share one in-flight loader.
 * Results go in and come out as copies, so callers never hold the stored array.
 */
export class FingerprintCache<T = unknown> {
  #entries: Map<string, T[]> = new Map();
  #pending: Map<string, PendingLoad<T>> = new Map();
  /** Bumped by `clear()` so loads started before it do not write afterwards. */
  #generation = 0;

  /** Fingerprint of a query, see {@link computeFingerprint}. */
  public fingerprint(resourceName: string, params?: QueryParams): string {
    return computeFingerprint(resourceName, params);
  }

  /** Copy of the cached result of a fingerprint, or `null`. */
  public get(fingerprint: string): T[] | null {
    const cached = this.#entries.get(fingerprint);
    return cached === undefined ? null : [...cached];
  }

  /** Stores a copy of a result, replacing any previous one. */
  public put(fingerprint: string, value: T[]) {
    this.#entries.set(fingerprint, [...value]);
  }

  public has(fingerprint: string): boolean {
    return this.#entries.has(fingerprint);
  }

  /** Number of cached results. */
  get size(): number {
    return this.#entries.size;
  }

  /** Drops every entry and forgets in-flight loads. */
  public clear() {
    this.#generation++;
    this.#entries = new Map();
    this.#pending = new Map();
  }

  /**
   * Returns the cached result for `fingerprint`, or runs `loader` and caches what it yields.
   *
   * - Without `refresh`, a cached entry is returned and a concurrent load of the
   *   same fingerprint is shared instead of started twice.
   * - With `refresh`, the loader always runs and its result replaces the entry.
   * - `signal` only ends this caller's wait with a {@link CancelledError}; the
   *   loader's own signal aborts when the last waiter cancels.
   * - Failures are returned unchanged and never cached.
   */
  public load(fingerprint: string, loader: Loader<T>, opts: LoadOptions = {}): SafeWrapAsync<Error, T[]> {
    const { refresh = false, signal } = opts;
    if (signal?.aborted) {
      return Promise.resolve<SafeWrap<Error, T[]>>([cancelled(signal), null]);
    }

    if (!refresh) {
      const cached = this.get(fingerprint);
      if (cached !== null) {
        return Promise.resolve<SafeWrap<Error, T[]>>([null, cached]);
      }

      const shared = this.#pending.get(fingerprint);
      if (shared !== undefined) {
        return this.#wait(fingerprint, shared, signal);
      }
    }

    return this.#wait(fingerprint, this.#start(fingerprint, loader), signal);
  }

  /** Starts a load and registers it as the shared one for `fingerprint`. */
  #start(fingerprint: string, loader: Loader<T>): PendingLoad<T> {
    const generation = this.#generation;
    const controller = new AbortController();
    const run = async (): SafeWrapAsync<Error, T[]> => {
      const [errWrapped, wrapped] = await safeWrapAsync(() => loader(controller.signal));
      const current = generation === this.#generation;
      if (current && this.#pending.get(fingerprint) === entry) {
        this.#pending.delete(fingerprint);
      }

      if (errWrapped) {
        return [errWrapped, null];
      }

      const [errData, data] = wrapped;
      if (errData) {
        return [errData, null];
      }

      if (current) {
        this.#entries.set(fingerprint, [...data]);
      }
      return [null, data];
    };
    const entry: PendingLoad<T> = {
      controller,
      waiters: 0,
      result: run(),
    };

    this.#pending.set(fingerprint, entry);
    return entry;
  }

  /** Waits on a shared load as one caller, leaving it early when `signal` aborts. */
  #wait(fingerprint: string, entry: PendingLoad<T>, signal?: AbortSignal): SafeWrapAsync<Error, T[]> {
    entry.waiters++;

    return new Promise<SafeWrap<Error, T[]>>((resolve) => {
      let left = false;
      const leave = (source: AbortSignal) => {
        left = true;
        entry.waiters--;
        if (entry.waiters === 0) {
          if (this.#pending.get(fingerprint) === entry) {
            this.#pending.delete(fingerprint);
          }
          entry.controller.abort(source.reason);
        }
        resolve([cancelled(source), null]);
      };
      const onAbort = () => {
        if (signal) {
          leave(signal);
        }
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      void entry.result.then(([err, data]) => {
        signal?.removeEventListener('abort', onAbort);
        if (left) {
          return;
        }

        entry.waiters--;
        resolve(err ? [err, null] : [null, [...data]]);
      });
    });
  }
}

/** Cancellation error for a caller whose signal aborted. */
function cancelled(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  return reason instanceof CancelledError ? reason : new CancelledError('error load cancelled', { cause: reason });
}
