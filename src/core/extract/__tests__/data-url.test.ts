// src/core/extract/__tests__/data-url.test.ts
import { describe, it, expect } from '@jest/globals';
import { decodeDataUrl } from '../data-url.js';
import { ErrorCode, ExtractionError } from '../../errors.js';

function decodeError(value: string): ExtractionError {
  try {
    decodeDataUrl(value);
  } catch (error) {
    if (error instanceof ExtractionError) return error;
    throw error;
  }
  throw new Error('expected decodeDataUrl to throw');
}

describe('decodeDataUrl', () => {
  it('should decode a base64 image payload', () => {
    const result = decodeDataUrl(`data:image/png;base64,${Buffer.from('pixels').toString('base64')}`);

    expect(result.mimeType).toBe('image/png');
    expect(result.bytes.toString()).toBe('pixels');
  });

  it('should ignore whitespace inside the base64 body', () => {
    const result = decodeDataUrl('data:image/jpeg;base64,cGl4\nZWxz');

    expect(result.bytes.toString()).toBe('pixels');
  });

  it('should decode a percent-encoded payload', () => {
    const result = decodeDataUrl('data:image/svg+xml,%3Csvg%2F%3E');

    expect(result.mimeType).toBe('image/svg+xml');
    expect(result.bytes.toString()).toBe('<svg/>');
  });

  it('should decode percent escapes above 0x7f as raw bytes', () => {
    const result = decodeDataUrl('data:image/png,%89PNG%0D%0A%1A%0A%FF');

    expect([...result.bytes]).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0xff]);
  });

  it('should reject a stray percent sign', () => {
    const error = decodeError('data:image/png,%8');

    expect(error.code).toBe(ErrorCode.DECODE_FAILED);
    expect(error.message).toBe('Corrupt percent-encoded payload');
  });

  it('should reject a value without a comma', () => {
    expect(decodeError('data:image/png;base64').message).toBe('Invalid data URL format');
  });

  it('should reject non-image payloads', () => {
    expect(decodeError('data:text/plain;base64,aGk=').message).toBe('Not an image data URL: text/plain');
  });

  it('should reject corrupt base64', () => {
    const error = decodeError('data:image/png;base64,@@@@');

    expect(error.code).toBe(ErrorCode.DECODE_FAILED);
    expect(error.phase).toBe('extraction');
    expect(error.message).toBe('Corrupt base64 payload');
  });

  it('should reject a truncated base64 body', () => {
    expect(decodeError('data:image/png;base64,aGVsb').message).toBe('Corrupt base64 payload');
  });

  it('should reject an empty payload', () => {
    expect(decodeError('data:image/png;base64,').message).toBe('Empty image payload');
  });
});
