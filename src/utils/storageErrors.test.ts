import { describe, expect, it } from 'vitest';
import { formatStorageError, isNotFoundError, isPermissionError, isQuotaError } from './storageErrors.js';

const fsError = (code: string): Error => Object.assign(new Error(`${code}: failed`), { code });

describe('storageErrors', () => {
  it('classifies errors by code', () => {
    expect(isNotFoundError(fsError('ENOENT'))).toBe(true);
    expect(isNotFoundError(fsError('ENOTDIR'))).toBe(true);
    expect(isPermissionError(fsError('EACCES'))).toBe(true);
    expect(isPermissionError(fsError('EPERM'))).toBe(true);
    expect(isQuotaError(fsError('ENOSPC'))).toBe(true);
    expect(isNotFoundError(new Error('plain'))).toBe(false);
    expect(isNotFoundError('ENOENT')).toBe(false);
  });

  it('formats user-safe messages', () => {
    expect(formatStorageError(fsError('ENOENT'))).toBe('File not found');
    expect(formatStorageError(fsError('EACCES'))).toBe('Permission denied');
    expect(formatStorageError(fsError('EDQUOT'))).toBe('Storage quota exceeded');
    expect(formatStorageError(new SyntaxError('Unexpected token'))).toBe('File is not valid JSON');
    expect(formatStorageError(new Error('boom'))).toBe('Storage operation failed');
    expect(formatStorageError(42)).toBe('An unknown storage error occurred');
  });
});
