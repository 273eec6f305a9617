// src/cli/exit-codes.ts
import { ErrorCode } from '../core/errors.js';
import type { CaptureResult } from '../core/export/types.js';
import type { CapturePhase } from '../core/types/index.js';

export const EXIT_CODES: Record<CapturePhase, number> & { success: 0; cancelled: 130 } = {
  success: 0,
  config: 1,
  auth: 2,
  navigation: 3,
  extraction: 4,
  assembly: 5,
  cancelled: 130,
};

export function exitCodeFor(result: CaptureResult): number {
  const error = result.diagnostics?.error;
  if (result.status === 'success' || !error) {
    return result.status === 'success' ? EXIT_CODES.success : EXIT_CODES.config;
  }
  if (error.code === ErrorCode.CANCELLED) {
    return EXIT_CODES.cancelled;
  }
  return EXIT_CODES[error.phase];
}
