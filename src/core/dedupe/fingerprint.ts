// src/core/dedupe/fingerprint.ts
import { createHash } from 'crypto';

/**
 * Content identity of a captured page. Two pages are the same page exactly
 * when their decoded bytes hash the same; visual similarity is not considered.
 */
export function fingerprint(content: Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}
