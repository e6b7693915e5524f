/**
 * ファイルシステムエラーの判定
 */

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * ファイル・ディレクトリが存在しないことによるエラーか
 */
export function isNotFoundError(error: unknown): error is NodeJS.ErrnoException {
  return isErrnoException(error) && error.code === 'ENOENT';
}
