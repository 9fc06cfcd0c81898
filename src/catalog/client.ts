import type { StandardSchemaV1 } from '@standard-schema/spec';
import { z } from 'zod';
import { ResourceNotFoundError, type ResourceKind } from '../error/resourceNotFoundError.js';
import { ValidationError } from '../error/validationError.js';
import { dataCatalogEntrySchema, findEntryList, serviceCatalogEntrySchema } from '../response/envelope.js';
import { exchange } from '../response/exchange.js';
import type { FetchClientProviderDefinition, HttpMethod } from '../types/request.js';
import { buildUrl } from '../utils/buildUrl.js';
import { type Logger, noopLogger } from '../utils/logger.js';
import { validator } from '../utils/validator.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';

/** Paginated read-only endpoint. */
export interface DataResource {
  readonly kind: 'data';
  readonly name: string;
  /** Absolute URL of the endpoint. */
  readonly url: string;
}

/** Single-shot operation endpoint. */
export interface ServiceResource {
  readonly kind: 'service';
  readonly name: string;
  readonly method: HttpMethod;
  /** Absolute URL of the endpoint. */
  readonly url: string;
}

export type ResourceDescriptor = DataResource | ServiceResource;

/** Loaded catalog; immutable once built. */
export interface CatalogSnapshot {
  readonly data: ReadonlyMap<string, DataResource>;
  readonly services: ReadonlyMap<string, ServiceResource>;
}

/** Options of a {@link ResourceCatalog}. */
export interface ResourceCatalogOptions {
  /** Logger for discovery. */
  logger?: Logger;
  /** Lifetime signal of the owning client; aborting it cancels discovery. */
  signal?: AbortSignal;
  /** Current timeout of each discovery call, in milliseconds. */
  timeout?: () => number;
}

/** Catalog documents, relative to the API base URL. */
const DATA_CATALOG_PATH = 'data.json';
const SERVICE_CATALOG_PATH = 'op.json';

/** Which listing a caller should check for each kind of lookup. */
const LISTING_HINT: Record<ResourceKind, string> = {
  data: "check 'dataResources()' for the available names",
  service: "check 'serviceResources()' for the available names",
  any: "check 'dataResources()' and 'serviceResources()' for the available names",
};

/** Relative catalog paths resolve beneath the base URL even when written with a leading slash. */
function relativePath(path: string): string {
  return path.replace(/^\/+/, '');
}

/**
 * Lazily discovers the data and service resources an API exposes.
 *
 * Discovery runs at most once per catalog: concurrent callers share the
 * in-flight load, a failed load is forgotten so the next call tries again.
 */
export class ResourceCatalog {
  #transport: FetchClientProviderDefinition;
  #baseUrl: string;
  #logger: Logger;
  #signal: AbortSignal | undefined;
  #timeout: () => number;
  #snapshot: CatalogSnapshot | null = null;
  #pending: SafeWrapAsync<Error, CatalogSnapshot> | null = null;

  /** Creates a catalog reading its documents through `transport`, beneath `baseUrl`. */
  constructor(transport: FetchClientProviderDefinition, baseUrl: string, opts: ResourceCatalogOptions = {}) {
    this.#transport = transport;
    this.#baseUrl = baseUrl;
    this.#logger = opts.logger ?? noopLogger;
    this.#signal = opts.signal;
    this.#timeout = opts.timeout ?? (() => 300_000);
  }

  /** Whether discovery has completed. */
  get loaded(): boolean {
    return this.#snapshot !== null;
  }

  /**
   * Loads both catalogs once and returns the snapshot.
   */
  public ensureLoaded(): SafeWrapAsync<Error, CatalogSnapshot> {
    if (this.#snapshot) {
      return Promise.resolve<SafeWrap<Error, CatalogSnapshot>>([null, this.#snapshot]);
    }

    if (this.#pending) {
      return this.#pending;
    }

    const pending = (async (): SafeWrapAsync<Error, CatalogSnapshot> => {
      const [err, snapshot] = await this.#discover();
      this.#pending = null;
      if (err) {
        return [err, null];
      }

      this.#snapshot = snapshot;
      return [null, snapshot];
    })();

    this.#pending = pending;
    return pending;
  }

  /**
   * Looks a name up as the given kind of resource.
   *
   * Errors:
   * - Discovery failures propagate unchanged.
   * - An unknown name yields a {@link ResourceNotFoundError}.
   */
  public async resolve(name: string, kind: 'data'): SafeWrapAsync<Error, DataResource>;
  public async resolve(name: string, kind: 'service'): SafeWrapAsync<Error, ServiceResource>;
  public async resolve(name: string, kind?: 'any'): SafeWrapAsync<Error, ResourceDescriptor>;
  public async resolve(name: string, kind: ResourceKind = 'any'): SafeWrapAsync<Error, ResourceDescriptor> {
    const [err, snapshot] = await this.ensureLoaded();
    if (err) {
      return [err, null];
    }

    const resource =
      (kind !== 'service' ? snapshot.data.get(name) : undefined) ??
      (kind !== 'data' ? snapshot.services.get(name) : undefined);
    if (!resource) {
      const label = kind === 'any' ? 'resource' : `${kind} resource`;
      return [new ResourceNotFoundError(`${label} '${name}' not found, ${LISTING_HINT[kind]}`, name, kind), null];
    }

    return [null, resource];
  }

  /** Fetches both catalog documents, one after the other. */
  async #discover(): SafeWrapAsync<Error, CatalogSnapshot> {
    const [errData, dataEntries] = await this.#readCatalog(DATA_CATALOG_PATH, z.array(dataCatalogEntrySchema));
    if (errData) {
      return [errData, null];
    }

    const [errServices, serviceEntries] = await this.#readCatalog(
      SERVICE_CATALOG_PATH,
      z.array(serviceCatalogEntrySchema),
    );
    if (errServices) {
      return [errServices, null];
    }

    const data = new Map<string, DataResource>();
    for (const entry of dataEntries) {
      const [errUrl, url] = buildUrl(this.#baseUrl, relativePath(entry.url));
      if (errUrl) {
        return [errUrl, null];
      }
      data.set(entry.name, { kind: 'data', name: entry.name, url });
    }

    const services = new Map<string, ServiceResource>();
    for (const entry of serviceEntries) {
      const [errUrl, url] = buildUrl(this.#baseUrl, relativePath(entry.path));
      if (errUrl) {
        return [errUrl, null];
      }
      services.set(entry.name, { kind: 'service', name: entry.name, method: entry.method, url });
    }

    this.#logger.info('resource catalog loaded', { data: data.size, services: services.size });
    return [null, { data, services }];
  }

  /** Fetches one catalog document and validates its entry list. */
  async #readCatalog<T extends StandardSchemaV1>(
    path: string,
    schema: T,
  ): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
    const [errUrl, url] = buildUrl(this.#baseUrl, path);
    if (errUrl) {
      return [errUrl, null];
    }

    this.#logger.debug('discovering resources', { url });
    const [err, body] = await exchange(this.#transport, { url, signal: this.#signal, timeout: this.#timeout() });
    if (err) {
      return [err, null];
    }

    const entries = findEntryList(body);
    if (!entries) {
      return [new ValidationError(`error locating resource entries in ${url}`, []), null];
    }

    return validator(entries, schema, `resource catalog ${path}`);
  }
}
