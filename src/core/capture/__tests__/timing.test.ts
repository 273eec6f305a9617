// src/core/capture/__tests__/timing.test.ts
import { describe, it, expect } from '@jest/globals';
import { exponentialBackoff, linearBackoff, withTimeout } from '../timing.js';
import { CaptureError, ErrorCode } from '../../errors.js';

describe('withTimeout', () => {
  it('should resolve with the operation result', async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, 'Answer')).resolves.toBe(42);
  });

  it('should reject with a timeout error tagged with the phase', async () => {
    const never = new Promise<never>(() => {});

    const error = await withTimeout(never, 5, 'Page extraction', 'extraction').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CaptureError);
    if (!(error instanceof CaptureError)) return;
    expect(error.code).toBe(ErrorCode.TIMEOUT);
    expect(error.phase).toBe('extraction');
    expect(error.message).toBe('Page extraction timed out after 5ms');
    expect(error.retryable).toBe(true);
  });

  it('should pass through the operation error', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000, 'Probe')).rejects.toThrow('boom');
  });
});

describe('backoff', () => {
  it('should double per attempt up to the cap', () => {
    expect([1, 2, 3, 4].map(n => exponentialBackoff(1000, n, 5000))).toEqual([1000, 2000, 4000, 5000]);
  });

  it('should grow linearly up to the cap', () => {
    expect([0, 1, 2, 3].map(n => linearBackoff(2000, n, 5000))).toEqual([2000, 2000, 4000, 5000]);
  });
});
