import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

class CustomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CustomError';
  }
}

describe('toError', () => {
  it('returns errors untouched', () => {
    const err = new CustomError('boom');
    expect(toError(err)).toBe(err);
  });

  it('wraps non-error values and keeps them as cause', () => {
    const err = toError('stopped');

    expect(err.message).toBe('non-error thrown: stopped');
    expect(err.cause).toBe('stopped');
  });
});

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => {
      throw new CustomError('custom boom');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(CustomError);
    expect(err?.message).toBe('custom boom');
  });

  it('returns [SyntaxError, null] when JSON.parse fails', () => {
    const [err, data] = safeWrap(() => JSON.parse('{ value: 123 '));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.resolve('ok'));

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject(new Error('async boom')));

    expect(data).toBeNull();
    expect(err?.message).toBe('async boom');
  });

  it('returns [error, null] when the factory throws before returning a promise', async () => {
    const [err, data] = await safeWrapAsync(() => {
      throw new CustomError('sync boom before promise');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(CustomError);
  });

  it('normalizes rejections with non-error reasons', async () => {
    const [err] = await safeWrapAsync(() => Promise.reject('closed'));

    expect(err).toBeInstanceOf(Error);
    expect(err?.cause).toBe('closed');
  });
});
