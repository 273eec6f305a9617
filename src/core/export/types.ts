// src/core/export/types.ts
import type { CapturePhase, DroppedCandidate, EndReason, PageGap } from '../types/index.js';

export interface CapturePaths {
  documentPath: string;
  pagesDir?: string;
}

export interface CaptureStats {
  pageCount: number;
  duplicates: number;
  durationMs: number;
}

export interface CaptureResult {
  status: 'success' | 'failed';
  issueDate: string;
  paths?: CapturePaths;
  stats?: CaptureStats;
  diagnostics?: {
    endReason?: EndReason;
    possiblyIncomplete?: boolean;
    warnings?: string[];
    gaps?: PageGap[];
    dropped?: DroppedCandidate[];
    error?: CaptureErrorInfo;
  };
}

export interface CaptureErrorInfo {
  code: ErrorCode;
  phase: CapturePhase;
  message: string;
  retryable: boolean;
  suggestion?: string;
}

export enum ErrorCode {
  INVALID_CONFIG = 'invalid_config',
  BROWSER_NOT_FOUND = 'browser_not_found',
  LOGIN_REQUIRED = 'login_required',
  AUTH_REJECTED = 'auth_rejected',
  NAVIGATION_FAILED = 'navigation_failed',
  TIMEOUT = 'timeout',
  RENDER_STALL = 'render_stall',
  NAVIGATION_STALL = 'navigation_stall',
  NO_PAGES_RENDERED = 'no_pages_rendered',
  DECODE_FAILED = 'decode_failed',
  FETCH_FAILED = 'fetch_failed',
  NO_PAGES_CAPTURED = 'no_pages_captured',
  UNSUPPORTED_FORMAT = 'unsupported_format',
  EXPORT_FAILED = 'export_failed',
  CANCELLED = 'cancelled',
}
