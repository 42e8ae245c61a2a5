import { describe, it, expect, vi } from 'vitest';
import { APICallError } from 'ai';

import { withRetry, isRetryableError, sleep } from '../../../src/ai/blog/retry';
import { BlogGenerationError } from '../../../src/ai/blog/types';

const silentLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

describe('isRetryableError', () => {
  it('returns true for rate limit errors', () => {
    expect(isRetryableError(new Error('Rate limit exceeded'))).toBe(true);
    expect(isRetryableError(new Error('Too many requests'))).toBe(true);
    expect(isRetryableError(new Error('429 error'))).toBe(true);
  });

  it('returns true for network errors', () => {
    expect(isRetryableError(new Error('Network error'))).toBe(true);
    expect(isRetryableError(new Error('ETIMEDOUT'))).toBe(true);
    expect(isRetryableError(new Error('ECONNRESET'))).toBe(true);
    expect(isRetryableError(new Error('socket hang up'))).toBe(true);
  });

  it('returns true for server errors and overload', () => {
    expect(isRetryableError(new Error('503 Service Unavailable'))).toBe(true);
    expect(isRetryableError(new Error('Bad gateway'))).toBe(true);
    expect(isRetryableError(new Error('Model overloaded'))).toBe(true);
  });

  it('returns false for client errors', () => {
    expect(isRetryableError(new Error('Invalid input'))).toBe(false);
    expect(isRetryableError(new Error('Authentication error'))).toBe(false);
  });

  it('trusts the provider classification of API call errors', () => {
    const callError = (statusCode: number, message: string) =>
      new APICallError({
        message,
        url: 'https://openrouter.ai/api/v1/chat/completions',
        requestBodyValues: {},
        statusCode,
      });

    expect(isRetryableError(callError(503, 'Upstream error'))).toBe(true);
    expect(isRetryableError(callError(429, 'Slow down'))).toBe(true);
    expect(isRetryableError(callError(401, 'Rate limit key invalid'))).toBe(false);
  });

  it('never retries aborts or timeouts', () => {
    const abort = new Error('network aborted');
    abort.name = 'AbortError';
    const timeout = new Error('network timed out');
    timeout.name = 'TimeoutError';

    expect(isRetryableError(abort)).toBe(false);
    expect(isRetryableError(timeout)).toBe(false);
  });

  it('reads status and statusCode properties', () => {
    expect(isRetryableError(Object.assign(new Error('limited'), { status: 429 }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('upstream'), { statusCode: 502 }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('bad request'), { status: 400 }))).toBe(false);
  });

  it('returns false for empty values', () => {
    expect(isRetryableError(undefined)).toBe(false);
    expect(isRetryableError(null)).toBe(false);
  });
});

describe('withRetry', () => {
  it('returns the result of the first successful call', async () => {
    const fn = vi.fn().mockResolvedValue('success');

    const result = await withRetry(fn, { maxRetries: 3, logger: silentLogger });

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries a retryable error and succeeds', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('Rate limit')).mockResolvedValueOnce('success');
    const onRetry = vi.fn();

    const result = await withRetry(fn, { maxRetries: 3, initialDelayMs: 1, onRetry, logger: silentLogger });

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, expect.any(Number));
  });

  it('throws immediately for non-retryable errors', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('Invalid input'));

    await expect(withRetry(fn, { maxRetries: 3, logger: silentLogger })).rejects.toThrow('Invalid input');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws the last error once retries are exhausted', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('Rate limit'));

    await expect(
      withRetry(fn, { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 2, logger: silentLogger })
    ).rejects.toThrow('Rate limit');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(silentLogger.warn).toHaveBeenCalledWith('operation failed after 3 attempts: Rate limit');
  });

  it('honours a custom shouldRetry', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok');

    const result = await withRetry(fn, {
      initialDelayMs: 1,
      shouldRetry: () => true,
      logger: silentLogger,
    });

    expect(result).toBe('ok');
  });

  it('throws CANCELLED without calling when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockResolvedValue('never');

    const error: unknown = await withRetry(fn, {
      signal: controller.signal,
      context: 'Writer section',
      logger: silentLogger,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BlogGenerationError);
    expect(error).toMatchObject({ code: 'CANCELLED', message: 'Writer section was cancelled' });
    expect(fn).not.toHaveBeenCalled();
  });

  it('throws CANCELLED when the signal aborts during a failing call', async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockImplementation(async () => {
      controller.abort();
      throw new Error('Rate limit');
    });

    await expect(
      withRetry(fn, { signal: controller.signal, logger: silentLogger })
    ).rejects.toMatchObject({ code: 'CANCELLED' });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    const done = vi.fn();

    const pending = sleep(500).then(done);
    await vi.advanceTimersByTimeAsync(499);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);

    vi.useRealTimers();
  });
});
