import { Agent } from 'undici';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConstructURLError } from '../error/constructUrlError.js';
import { TimeoutError } from '../error/timeoutError.js';
import type { FetchFunction, FetchInit, FetchResponse } from '../types/request.js';
import { FetchClient } from './client.js';

const base = 'https://prime.test/webacs/api/v1';

function okResponse(url: string): FetchResponse {
  return {
    status: 200,
    url,
    headers: new Headers({ 'Content-Type': 'application/json' }),
    text: () => Promise.resolve('{}'),
  };
}

function mockFetch() {
  return vi.fn<FetchFunction>((url) => Promise.resolve(okResponse(url)));
}

function initOf(fetchMock: ReturnType<typeof mockFetch>, call = 0): FetchInit | undefined {
  return fetchMock.mock.calls[call]?.[1];
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('FetchClient', () => {
  describe('GET', () => {
    it('resolves the path against the base URL and appends params', async () => {
      const fetchMock = mockFetch();
      const client = new FetchClient(base, { fetch: fetchMock });

      const [err, response] = await client.get('data/Devices', { params: { '.full': true, '.maxResults': 10 } });

      expect(err).toBeNull();
      expect(response?.status).toBe(200);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0]?.[0]).toBe(
        'https://prime.test/webacs/api/v1/data/Devices?.full=true&.maxResults=10',
      );
      expect(initOf(fetchMock)).toEqual({
        method: 'GET',
        headers: { accept: 'application/json' },
        redirect: 'manual',
      });
    });

    it('sends basic credentials', async () => {
      const fetchMock = mockFetch();
      const client = new FetchClient(base, { fetch: fetchMock, username: 'test-user', password: 'test-secret' });

      await client.get('data.json');

      expect(initOf(fetchMock)?.headers.authorization).toBe('Basic dGVzdC11c2VyOnRlc3Qtc2VjcmV0');
    });

    it('passes the signal through', async () => {
      const fetchMock = mockFetch();
      const client = new FetchClient(base, { fetch: fetchMock });
      const controller = new AbortController();

      await client.get('data.json', { signal: controller.signal });

      expect(initOf(fetchMock)?.signal).toBe(controller.signal);
    });

    it('returns non-2xx responses untouched', async () => {
      const fetchMock = vi.fn<FetchFunction>((url) => Promise.resolve({ ...okResponse(url), status: 503 }));
      const client = new FetchClient(base, { fetch: fetchMock });

      const [err, response] = await client.get('data/Devices');

      expect(err).toBeNull();
      expect(response?.status).toBe(503);
    });
  });

  describe('request', () => {
    it('sends the body with the given method', async () => {
      const fetchMock = mockFetch();
      const client = new FetchClient(base, { fetch: fetchMock });

      await client.request('PUT', 'op/devices/sync', {
        body: '{"devices":[1]}',
        headers: { 'Content-Type': 'application/json' },
      });

      expect(initOf(fetchMock)).toMatchObject({
        method: 'PUT',
        body: '{"devices":[1]}',
        headers: { accept: 'application/json', 'content-type': 'application/json' },
      });
    });
  });

  describe('config', () => {
    it('merges headers and allows removing them', async () => {
      const fetchMock = mockFetch();
      const client = new FetchClient(base, { fetch: fetchMock, headers: { 'X-Base': '1' } });

      client.config({ headers: { 'X-Extra': '2' } });
      client.config({ headers: { 'X-Base': null, 'X-Extra': '3' } });
      await client.get('data.json');

      expect(initOf(fetchMock)?.headers).toEqual({ accept: 'application/json', 'x-extra': '3' });
    });

    it('updates credentials', async () => {
      const fetchMock = mockFetch();
      const client = new FetchClient(base, { fetch: fetchMock, username: 'someone', password: 'other' });

      client.config({ username: 'test-user', password: 'test-secret' });
      await client.get('data.json');

      expect(initOf(fetchMock)?.headers.authorization).toBe('Basic dGVzdC11c2VyOnRlc3Qtc2VjcmV0');
    });
  });

  describe('ERRORS', () => {
    it('wraps network failures', async () => {
      const failure = new TypeError('fetch failed');
      const client = new FetchClient(base, { fetch: vi.fn<FetchFunction>(() => Promise.reject(failure)) });

      const [err, response] = await client.get('data/Devices');

      expect(response).toBeNull();
      expect(err?.message).toBe('error in GET request to https://prime.test/webacs/api/v1/data/Devices');
      expect(err?.cause).toBe(failure);
    });

    it('reports the abort reason as cause when the signal aborted', async () => {
      const controller = new AbortController();
      const reason = new TimeoutError('error request timed out after 10ms', 10);
      const client = new FetchClient(base, {
        fetch: vi.fn<FetchFunction>(() => {
          controller.abort(reason);
          return Promise.reject(new DOMException('aborted', 'AbortError'));
        }),
      });

      const [err] = await client.get('data/Devices', { signal: controller.signal });

      expect(err?.cause).toBe(reason);
    });

    it('returns a ConstructURLError for unbuildable URLs', async () => {
      const fetchMock = mockFetch();
      const client = new FetchClient('not a url', { fetch: fetchMock });

      const [err] = await client.get('data.json');

      expect(err).toBeInstanceOf(ConstructURLError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('keeps a custom fetch free of the connection pool', async () => {
      const closeSpy = vi.spyOn(Agent.prototype, 'close');
      const fetchMock = mockFetch();
      const client = new FetchClient(base, { fetch: fetchMock });

      await client.get('data.json');
      await client.dispose();

      expect(initOf(fetchMock)?.dispatcher).toBeUndefined();
      expect(closeSpy).not.toHaveBeenCalled();
    });

    it('creates the connection pool on the first default fetch and closes it on dispose', async () => {
      const closeSpy = vi.spyOn(Agent.prototype, 'close');
      const client = new FetchClient(base);

      await client.dispose();
      expect(closeSpy).not.toHaveBeenCalled();

      const used = new FetchClient(base);
      const [err] = await used.get('data.json', { signal: AbortSignal.abort() });
      await used.dispose();

      expect(err?.message).toBe('error in GET request to https://prime.test/webacs/api/v1/data.json');
      expect(closeSpy).toHaveBeenCalledTimes(1);
    });

    it('fails calls after dispose', async () => {
      const fetchMock = mockFetch();
      const client = new FetchClient(base, { fetch: fetchMock });

      await client.dispose();
      await client.dispose();
      const [err] = await client.get('data.json');

      expect(err?.message).toBe('error in GET request, transport is disposed');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
