import { describe, it, expect, vi } from 'vitest';
import { isTransientError, withRetry } from '../lib/retry.js';

function httpError(message: string, status: number) {
  return Object.assign(new Error(message), { status });
}

describe('isTransientError', () => {
  it.each([408, 429, 500, 502, 503, 529])('treats HTTP %i as transient', (status) => {
    expect(isTransientError(httpError('failed', status))).toBe(true);
  });

  it('lets the status decide over the message', () => {
    expect(isTransientError(httpError('rate limit exceeded', 400))).toBe(false);
    expect(isTransientError(Object.assign(new Error('x'), { statusCode: 503 }))).toBe(true);
  });

  it('recognizes connection error codes case-insensitively', () => {
    expect(isTransientError(Object.assign(new Error('socket closed'), { code: 'econnreset' }))).toBe(true);
    expect(isTransientError(Object.assign(new Error('bad input'), { code: 'ERR_INVALID_ARG' }))).toBe(false);
  });

  it('falls back to message patterns', () => {
    expect(isTransientError(new Error('Anthropic API is Overloaded'))).toBe(true);
    expect(isTransientError('fetch failed')).toBe(true);
    expect(isTransientError(new Error('Invalid CandidateProfile'))).toBe(false);
  });
});

describe('withRetry', () => {
  it('retries transient HTTP status errors', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 3) throw httpError('temporary outage', 503);
      return 'ok';
    }, { maxAttempts: 3, baseDelay: 1 });

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('makes two attempts by default and reports each retry', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn(async () => {
      throw httpError('overloaded', 529);
    });

    await expect(withRetry(fn, { baseDelay: 1, onRetry })).rejects.toThrow('overloaded');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
  });

  it('does not retry non-transient errors', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new Error('validation failed');
    }, { maxAttempts: 3, baseDelay: 1 })).rejects.toThrow('validation failed');
    expect(attempts).toBe(1);
  });
});
