// src/core/extract/__tests__/image-format.test.ts
import { describe, it, expect } from '@jest/globals';
import { sniffImageFormat } from '../image-format.js';

describe('sniffImageFormat', () => {
  it('should detect PNG', () => {
    expect(sniffImageFormat(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]))).toBe('png');
  });

  it('should detect JPEG', () => {
    expect(sniffImageFormat(Buffer.from([0xff, 0xd8, 0xff, 0xe0]))).toBe('jpeg');
  });

  it('should detect GIF', () => {
    expect(sniffImageFormat(Buffer.from('GIF89a', 'latin1'))).toBe('gif');
  });

  it('should detect WebP', () => {
    expect(sniffImageFormat(Buffer.from('RIFF\x00\x00\x00\x00WEBPVP8 ', 'latin1'))).toBe('webp');
  });

  it('should return null for unknown or short input', () => {
    expect(sniffImageFormat(Buffer.from('<html>'))).toBeNull();
    expect(sniffImageFormat(Buffer.from([0x89, 0x50]))).toBeNull();
  });
});
