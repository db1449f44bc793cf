import { afterEach, describe, expect, it, vi } from 'vitest';

import { sanitizeError, TimeoutError, withTimeout } from '../security.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the value of a prompt operation', async () => {
    await expect(withTimeout(Promise.resolve('found'), 50)).resolves.toBe('found');
  });

  it('should pass rejections through', async () => {
    await expect(withTimeout(Promise.reject(new Error('lookup failed')), 50)).rejects.toThrow(
      'lookup failed'
    );
  });

  it('should reject with a TimeoutError once the limit passes', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => undefined), 1000);
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

    await vi.advanceTimersByTimeAsync(1000);

    await assertion;
    await expect(pending).rejects.toThrow('Operation timed out after 1000ms');
  });

  it('should clear its timer when the operation settles', async () => {
    vi.useFakeTimers();

    await withTimeout(Promise.resolve(1), 1000);

    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('sanitizeError', () => {
  it('should redact secrets in messages', () => {
    expect(sanitizeError('request failed: token=test-secret password: test-password')).toBe(
      'request failed: token=*** password=***'
    );
  });

  it('should read the message of an Error', () => {
    expect(sanitizeError(new Error('api_key=test-secret rejected'))).toBe('api_key=*** rejected');
  });

  it('should describe anything else as unknown', () => {
    expect(sanitizeError(42)).toBe('An unknown error occurred');
  });
});
