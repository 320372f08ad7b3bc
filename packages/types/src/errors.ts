/**
 * Node.jsのシステムエラー判定
 */

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * ファイルが存在しないことを示すエラーか
 */
export function isNotFoundError(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}
