// Filesystem error classification and formatting utilities

const errorCode = (err: unknown): string | undefined => {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
};

/**
 * Detects a missing file or directory (ENOENT, or ENOTDIR for a file in place of a folder).
 */
export function isNotFoundError(err: unknown): boolean {
  const code = errorCode(err);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/**
 * Detects permission failures on read or write.
 */
export function isPermissionError(err: unknown): boolean {
  const code = errorCode(err);
  return code === 'EACCES' || code === 'EPERM';
}

/**
 * Detects a full disk or exhausted quota.
 */
export function isQuotaError(err: unknown): boolean {
  const code = errorCode(err);
  return code === 'ENOSPC' || code === 'EDQUOT';
}

/**
 * Formats a storage error into a user-safe message (no stack traces).
 */
export function formatStorageError(err: unknown): string {
  if (isNotFoundError(err)) {
    return 'File not found';
  }
  if (isPermissionError(err)) {
    return 'Permission denied';
  }
  if (isQuotaError(err)) {
    return 'Storage quota exceeded';
  }
  if (err instanceof SyntaxError) {
    return 'File is not valid JSON';
  }
  if (err instanceof Error) {
    return 'Storage operation failed';
  }
  return 'An unknown storage error occurred';
}
