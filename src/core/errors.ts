// src/core/errors.ts
import { ErrorCode } from './export/types.js';
import type { CaptureResult } from './export/types.js';
import type { CapturePhase } from './types/index.js';

export { ErrorCode };

export class CaptureError extends Error {
  code: ErrorCode;
  phase: CapturePhase;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    phase: CapturePhase,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CaptureError';
    this.code = code;
    this.phase = phase;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

/** The portal refused credentials, or rejected the session mid-run. */
export class AuthError extends CaptureError {
  constructor(message: string, code: ErrorCode = ErrorCode.AUTH_REJECTED, context?: Record<string, unknown>) {
    super(code, 'auth', message, false, 'Check ISSUE_CAPTURE_USERNAME / ISSUE_CAPTURE_PASSWORD', context);
    this.name = 'AuthError';
  }
}

/** A page position never left its placeholder state. */
export class RenderStallError extends CaptureError {
  constructor(message: string, code: ErrorCode = ErrorCode.RENDER_STALL, context?: Record<string, unknown>) {
    super(code, 'navigation', message, true, 'Raise --max-retries or --step-timeout', context);
    this.name = 'RenderStallError';
  }
}

/** Advancing stopped changing the visible content. Read as end-of-issue. */
export class NavigationStallError extends CaptureError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.NAVIGATION_STALL, 'navigation', message, true, 'Raise --max-stalls if pages are missing', context);
    this.name = 'NavigationStallError';
  }
}

export class ExtractionError extends CaptureError {
  constructor(
    code: ErrorCode.DECODE_FAILED | ErrorCode.FETCH_FAILED,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(code, 'extraction', message, true, undefined, context);
    this.name = 'ExtractionError';
  }
}

export class AssemblyError extends CaptureError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(code, 'assembly', message, false, undefined, context);
    this.name = 'AssemblyError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createFailedResult(
  error: CaptureError,
  issueDate: string
): CaptureResult & { status: 'failed' } {
  return {
    status: 'failed',
    issueDate,
    diagnostics: {
      warnings: [],
      error: {
        code: error.code,
        phase: error.phase,
        message: error.message,
        retryable: error.retryable,
        suggestion: error.suggestion,
      },
    },
  };
}
