import { Hono } from 'hono';
import { basicAuthorization } from '../fetch/utils.js';
import type { FetchFunction, HttpMethod } from '../types/request.js';

export const FAKE_ORIGIN = 'https://prime.test';
export const FAKE_API_PATH = '/webacs/api/v1';
export const FAKE_BASE_URL = `${FAKE_ORIGIN}${FAKE_API_PATH}/`;
export const FAKE_USERNAME = 'test-user';
export const FAKE_PASSWORD = 'test-secret';

/** Canned failure for requests matching a path and, optionally, a page offset. */
export interface FakeFailure {
  path: string;
  firstResult?: number;
  status: number;
  body?: unknown;
}

export interface FakeApiOptions {
  /** Records per data resource. */
  records?: Record<string, unknown[]>;
  /** Service operations, by name. */
  services?: Record<string, { method: HttpMethod; path: string }>;
  /** Count key used in envelopes. */
  countKey?: '@count' | '@counts';
  failures?: FakeFailure[];
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function toInt(value: string | undefined): number | null {
  return value === undefined ? null : Number.parseInt(value, 10);
}

/**
 * In-process stand-in for a paginated API: serves both catalogs, count probes,
 * pages sliced by `.firstResult`/`.maxResults`, and echoes service calls.
 */
export function createFakeApi(opts: FakeApiOptions = {}) {
  const records = opts.records ?? {};
  const services = opts.services ?? {};
  const countKey = opts.countKey ?? '@count';
  const calls: string[] = [];
  const expectedAuth = basicAuthorization(FAKE_USERNAME, FAKE_PASSWORD);

  const app = new Hono().basePath(FAKE_API_PATH);

  app.use('*', async (c, next) => {
    const url = new URL(c.req.url);
    calls.push(`${c.req.method} ${url.pathname.slice(FAKE_API_PATH.length)}${url.search}`);

    if (c.req.header('authorization') !== expectedAuth) {
      return new Response(null, { status: 401 });
    }

    const path = url.pathname.slice(FAKE_API_PATH.length + 1);
    const firstResult = toInt(c.req.query('.firstResult'));
    const failure = opts.failures?.find(
      (f) => f.path === path && (f.firstResult === undefined || f.firstResult === firstResult),
    );
    if (failure) {
      return json(failure.body ?? {}, failure.status);
    }

    await next();
  });

  app.get('/data.json', () =>
    json({
      queryResponse: {
        entityType: Object.keys(records).map((name) => ({ '@displayName': name, '@url': `/data/${name}` })),
      },
    }),
  );

  app.get('/op.json', () =>
    json({
      queryResponse: {
        operation: Object.entries(services).map(([name, op]) => ({
          displayName: name,
          httpMethod: op.method.toLowerCase(),
          path: op.path,
        })),
      },
    }),
  );

  app.get('/data/:name', (c) => {
    const all = records[c.req.param('name')];
    if (!all) {
      return new Response(null, { status: 404 });
    }

    const firstResult = toInt(c.req.query('.firstResult'));
    const maxResults = toInt(c.req.query('.maxResults')) ?? all.length;
    if (firstResult === null) {
      return json({ queryResponse: { [countKey]: all.length } });
    }

    return json({ queryResponse: { [countKey]: all.length, entity: all.slice(firstResult, firstResult + maxResults) } });
  });

  app.all('/op/*', async (c) =>
    json({
      method: c.req.method,
      query: c.req.query(),
      contentType: c.req.header('content-type') ?? null,
      body: await c.req.text(),
    }),
  );

  const fetch: FetchFunction = async (url, init) =>
    app.request(url, {
      method: init.method,
      headers: init.headers,
      ...(init.body !== undefined && { body: init.body }),
      ...(init.signal && { signal: init.signal }),
    });

  return { app, calls, fetch };
}

/** `count` records `{ id }` with ids starting at 0. */
export function makeRecords(count: number): Array<{ id: number }> {
  return Array.from({ length: count }, (_, id) => ({ id }));
}
