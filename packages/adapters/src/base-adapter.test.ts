import { describe, it, expect } from 'vitest';
import { ConfigError, ProviderError } from '@arena/shared';
import { BaseProviderAdapter, type APIErrorLike, type ErrorTypeConfig } from './base-adapter';
import { RateLimitError, TimeoutError } from './errors';

class TestAdapter extends BaseProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike =>
      error instanceof Error && 'status' in error && typeof error.status === 'number',
    isTimeoutError: (error: unknown): boolean => error === 'timeout',
  };

  public map(error: unknown): Error {
    return this.mapError(error);
  }
}

const apiError = (status: number, message: string) => Object.assign(new Error(message), { status });

describe('BaseProviderAdapter.mapError', () => {
  const adapter = new TestAdapter();

  it('maps 429 to RateLimitError', () => {
    const err = adapter.map(apiError(429, 'rate limited'));
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err.message).toBe('rate limited');
  });

  it('maps 401 to ConfigError', () => {
    expect(adapter.map(apiError(401, 'unauthorized'))).toBeInstanceOf(ConfigError);
  });

  it('wraps other API errors in ProviderError with the cause', () => {
    const original = apiError(500, 'server');
    const err = adapter.map(original);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err.message).toBe('server');
    expect(err.cause).toBe(original);
  });

  it('maps timeout errors to TimeoutError', () => {
    const err = adapter.map('timeout');
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err.message).toBe('timeout');
  });

  it('leaves provider errors untouched', () => {
    const original = new ProviderError('already mapped');
    expect(adapter.map(original)).toBe(original);
  });

  it('wraps non-Error values', () => {
    const err = adapter.map(123);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err.message).toBe('123');
  });
});
