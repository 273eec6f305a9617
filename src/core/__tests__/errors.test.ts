// src/core/__tests__/errors.test.ts
import { describe, it, expect } from '@jest/globals';
import {
  AssemblyError,
  AuthError,
  CaptureError,
  ExtractionError,
  NavigationStallError,
  RenderStallError,
  createFailedResult,
  describeError,
} from '../errors.js';
import { ErrorCode } from '../export/types.js';

describe('CaptureError', () => {
  it('should create error with all properties', () => {
    const error = new CaptureError(
      ErrorCode.NAVIGATION_FAILED,
      'navigation',
      'Failed to open issue',
      true,
      'Check --issue',
      { issueLocator: '#todays-issue' }
    );

    expect(error).toBeInstanceOf(CaptureError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('CaptureError');
    expect(error.code).toBe(ErrorCode.NAVIGATION_FAILED);
    expect(error.phase).toBe('navigation');
    expect(error.message).toBe('Failed to open issue');
    expect(error.retryable).toBe(true);
    expect(error.suggestion).toBe('Check --issue');
    expect(error.context).toEqual({ issueLocator: '#todays-issue' });
  });

  it('should create error with minimal properties', () => {
    const error = new CaptureError(ErrorCode.INVALID_CONFIG, 'config', 'Bad value');

    expect(error.retryable).toBe(false);
    expect(error.suggestion).toBeUndefined();
    expect(error.context).toBeUndefined();
  });
});

describe('error kinds', () => {
  it('should place each kind in its phase', () => {
    expect(new AuthError('Portal rejected the credentials')).toMatchObject({
      name: 'AuthError',
      code: ErrorCode.AUTH_REJECTED,
      phase: 'auth',
      retryable: false,
    });
    expect(new RenderStallError('never rendered')).toMatchObject({
      name: 'RenderStallError',
      code: ErrorCode.RENDER_STALL,
      phase: 'navigation',
      retryable: true,
    });
    expect(new NavigationStallError('no new page')).toMatchObject({
      code: ErrorCode.NAVIGATION_STALL,
      phase: 'navigation',
    });
    expect(new ExtractionError(ErrorCode.FETCH_FAILED, 'HTTP 500')).toMatchObject({
      phase: 'extraction',
      retryable: true,
    });
    expect(new AssemblyError(ErrorCode.EXPORT_FAILED, 'disk full')).toMatchObject({
      phase: 'assembly',
      retryable: false,
    });
  });

  it('should stay catchable as CaptureError', () => {
    expect(new AuthError('x', ErrorCode.LOGIN_REQUIRED)).toBeInstanceOf(CaptureError);
    expect(new AuthError('x', ErrorCode.LOGIN_REQUIRED).code).toBe(ErrorCode.LOGIN_REQUIRED);
  });
});

describe('createFailedResult', () => {
  it('should create failed result from error', () => {
    const error = new AssemblyError(ErrorCode.NO_PAGES_CAPTURED, 'No pages were captured; nothing to assemble');

    expect(createFailedResult(error, '20261018')).toEqual({
      status: 'failed',
      issueDate: '20261018',
      diagnostics: {
        warnings: [],
        error: {
          code: 'no_pages_captured',
          phase: 'assembly',
          message: 'No pages were captured; nothing to assemble',
          retryable: false,
          suggestion: undefined,
        },
      },
    });
  });
});

describe('describeError', () => {
  it('should prefer the message of an Error', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
