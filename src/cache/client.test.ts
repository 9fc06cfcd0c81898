import { describe, expect, it, vi } from 'vitest';
import { CancelledError } from '../error/cancelledError.js';
import { NoResultError } from '../error/noResultError.js';
import type { SafeWrap } from '../utils/wrap.js';
import { computeFingerprint, FingerprintCache } from './client.js';

/** Promise whose settlement the test controls. */
function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

const ok = <T>(value: T) => Promise.resolve<SafeWrap<Error, T>>([null, value]);

describe('computeFingerprint', () => {
  it('hashes the canonical serialization', () => {
    expect(computeFingerprint('Devices', { reachability: 'REACHABLE', ipAddress: '10.0.0.1' })).toBe(
      'ad7ca1000d101aa02f9e23e1b24290fc410c213179925eca5599766ebec36d30',
    );
    expect(computeFingerprint('Devices')).toBe('74fa4ab24ea213e1d0aff0caf97f57070bb94515c16d83b36338fbc3024508d6');
  });

  it('ignores insertion order', () => {
    const a = computeFingerprint('Devices', { '.full': true, ipAddress: '10.0.0.1', _ctx: 'x' });
    const b = computeFingerprint('Devices', { _ctx: 'x', ipAddress: '10.0.0.1', '.full': true });

    expect(a).toBe(b);
  });

  it('separates resources and values', () => {
    const base = computeFingerprint('Devices', { id: 1 });

    expect(computeFingerprint('Alarms', { id: 1 })).not.toBe(base);
    expect(computeFingerprint('Devices', { id: 2 })).not.toBe(base);
  });

  it('formats values as strings', () => {
    expect(computeFingerprint('Devices', { id: 1 })).toBe(computeFingerprint('Devices', { id: '1' }));
  });
});

describe('FingerprintCache', () => {
  it('stores and reads entries', () => {
    const cache = new FingerprintCache();
    const fp = cache.fingerprint('Devices', { id: 1 });

    expect(cache.get(fp)).toBeNull();
    expect(cache.has(fp)).toBe(false);

    cache.put(fp, [{ id: 1 }]);

    expect(cache.get(fp)).toEqual([{ id: 1 }]);
    expect(cache.has(fp)).toBe(true);
    expect(cache.size).toBe(1);

    cache.clear();
    expect(cache.size).toBe(0);
  });

  it('loads once and serves the cached result afterwards', async () => {
    const cache = new FingerprintCache();
    const loader = vi.fn(() => ok([1, 2]));

    expect(await cache.load('fp', loader)).toEqual([null, [1, 2]]);
    expect(await cache.load('fp', loader)).toEqual([null, [1, 2]]);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('shares an in-flight load between concurrent callers', async () => {
    const cache = new FingerprintCache();
    const gate = deferred<SafeWrap<Error, unknown[]>>();
    const loader = vi.fn(() => gate.promise);

    const first = cache.load('fp', loader);
    const second = cache.load('fp', loader);

    expect(loader).toHaveBeenCalledTimes(1);

    gate.resolve([null, ['a']]);

    expect(await first).toEqual([null, ['a']]);
    expect(await second).toEqual([null, ['a']]);
    expect(cache.get('fp')).toEqual(['a']);
  });

  it('lets one caller cancel its wait without cancelling the others', async () => {
    const cache = new FingerprintCache();
    const gate = deferred<SafeWrap<Error, unknown[]>>();
    let loadSignal: AbortSignal | undefined;
    const loader = vi.fn((signal: AbortSignal) => {
      loadSignal = signal;
      return gate.promise;
    });
    const controller = new AbortController();

    const cancelled = cache.load('fp', loader, { signal: controller.signal });
    const waiting = cache.load('fp', loader);
    controller.abort();

    const [err] = await cancelled;
    expect(err).toBeInstanceOf(CancelledError);
    expect(err?.message).toBe('error load cancelled');
    expect(loadSignal?.aborted).toBe(false);

    gate.resolve([null, ['a']]);

    expect(await waiting).toEqual([null, ['a']]);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('aborts the loader once every waiter has cancelled', async () => {
    const cache = new FingerprintCache();
    const gate = deferred<SafeWrap<Error, unknown[]>>();
    let loadSignal: AbortSignal | undefined;
    const loader = vi.fn((signal: AbortSignal) => {
      loadSignal = signal;
      return gate.promise;
    });
    const first = new AbortController();
    const second = new AbortController();

    const pending = [cache.load('fp', loader, { signal: first.signal }), cache.load('fp', loader, { signal: second.signal })];
    first.abort();
    expect(loadSignal?.aborted).toBe(false);
    second.abort();
    expect(loadSignal?.aborted).toBe(true);

    const results = await Promise.all(pending);
    expect(results.map(([err]) => err instanceof CancelledError)).toEqual([true, true]);

    gate.resolve([null, ['late']]);
    expect(await cache.load('fp', () => ok(['fresh']))).toEqual([null, ['fresh']]);
  });

  it('returns a pre-aborted caller without starting a load', async () => {
    const cache = new FingerprintCache();
    const loader = vi.fn(() => ok(['a']));
    const reason = new CancelledError('error client was disposed');

    const [err] = await cache.load('fp', loader, { signal: AbortSignal.abort(reason) });

    expect(err).toBe(reason);
    expect(loader).not.toHaveBeenCalled();
  });

  it('hands out copies of cached results', async () => {
    const cache = new FingerprintCache();
    const [, loaded] = await cache.load('fp', () => ok(['a', 'b']));
    loaded?.splice(0);

    const [, cached] = await cache.load('fp', () => ok(['unused']));
    cached?.push('c');

    expect(cache.get('fp')).toEqual(['a', 'b']);

    const stored = ['x'];
    cache.put('other', stored);
    stored.push('y');
    cache.get('other')?.push('z');

    expect(cache.get('other')).toEqual(['x']);
  });

  it('refresh always loads and replaces the entry', async () => {
    const cache = new FingerprintCache();
    cache.put('fp', ['old']);
    const loader = vi.fn(() => ok(['new']));

    expect(await cache.load('fp', loader, { refresh: true })).toEqual([null, ['new']]);
    expect(loader).toHaveBeenCalledTimes(1);
    expect(await cache.load('fp', vi.fn(() => ok(['unused'])))).toEqual([null, ['new']]);
  });

  it('returns failures unchanged and does not cache them', async () => {
    const cache = new FingerprintCache();
    const failure = new NoResultError('no results found', { url: 'https://prime.test/data/Devices', status: 200 });

    expect(await cache.load('fp', () => Promise.resolve<SafeWrap<Error, unknown[]>>([failure, null]))).toEqual([failure, null]);
    expect(cache.has('fp')).toBe(false);

    const loader = vi.fn(() => ok(['later']));
    expect(await cache.load('fp', loader)).toEqual([null, ['later']]);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('wraps loaders that throw', async () => {
    const cache = new FingerprintCache();

    const [err] = await cache.load('fp', () => Promise.reject(new Error('boom')));

    expect(err?.message).toBe('boom');
  });

  it('does not write loads that finish after clear', async () => {
    const cache = new FingerprintCache();
    const gate = deferred<SafeWrap<Error, unknown[]>>();

    const pending = cache.load('fp', () => gate.promise);
    cache.clear();
    gate.resolve([null, ['stale']]);

    expect(await pending).toEqual([null, ['stale']]);
    expect(cache.has('fp')).toBe(false);
  });
});
