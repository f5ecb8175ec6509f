// Path: src/utils/error.test.ts
// Tests for error helpers

import { describe, it, expect } from 'vitest';
import {
  ResolverError,
  extractErrorMessage,
  getErrnoCode,
  isResolverError,
  wrapError,
} from './error.js';

describe('extractErrorMessage', () => {
  it('should handle errors, strings and other values', () => {
    expect(extractErrorMessage(new Error('boom'))).toBe('boom');
    expect(extractErrorMessage('plain')).toBe('plain');
    expect(extractErrorMessage(42)).toBe('42');
  });
});

describe('getErrnoCode', () => {
  it('should read the code of system errors', () => {
    const err = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    expect(getErrnoCode(err)).toBe('ENOENT');
    expect(getErrnoCode(new Error('no code'))).toBeUndefined();
    expect(getErrnoCode('ENOENT')).toBeUndefined();
  });
});

describe('wrapError', () => {
  it('should wrap a plain error with code, cause and metadata', () => {
    const cause = new Error('disk full');
    const wrapped = wrapError(cause, 'OUTPUT_WRITE_FAILED', { outputPath: '/srv/app/.env' });

    expect(wrapped).toBeInstanceOf(ResolverError);
    expect(wrapped.message).toBe('disk full');
    expect(wrapped.code).toBe('OUTPUT_WRITE_FAILED');
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.metadata).toEqual({ outputPath: '/srv/app/.env' });
  });

  it('should return a ResolverError unchanged', () => {
    const original = new ResolverError('timed out', 'COMMAND_TIMEOUT');
    expect(wrapError(original, 'COMMAND_FAILED')).toBe(original);
  });

  it('should wrap non-error values', () => {
    const wrapped = wrapError('bad thing', 'COMMAND_FAILED');
    expect(wrapped.message).toBe('bad thing');
    expect(wrapped.cause).toBeUndefined();
    expect(isResolverError(wrapped)).toBe(true);
  });
});
