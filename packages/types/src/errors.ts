/**
 * エラー定義
 */

export type OutlineChunksErrorCode =
  | 'INVALID_TOKEN'
  | 'MALFORMED_RECORD_BOUNDARY'
  | 'INVALID_CONFIG';

export class OutlineChunksError extends Error {
  constructor(
    message: string,
    public readonly code: OutlineChunksErrorCode,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'OutlineChunksError';
  }
}

/**
 * 番号トークンを分解できない
 * Matcherの文法とResolverが整合していれば到達しない（内部不整合）
 */
export class InvalidTokenError extends OutlineChunksError {
  constructor(public readonly token: string) {
    super(`Invalid header token: "${token}"`, 'INVALID_TOKEN', { token });
    this.name = 'InvalidTokenError';
  }
}

/**
 * チャンク本文を出力形式で安全に往復できない
 */
export class MalformedRecordBoundaryError extends OutlineChunksError {
  constructor(message: string, data?: { recordIndex?: number; chunkId?: string }) {
    super(message, 'MALFORMED_RECORD_BOUNDARY', data);
    this.name = 'MalformedRecordBoundaryError';
  }
}

export class ConfigValidationError extends OutlineChunksError {
  constructor(message: string, public readonly path: string) {
    super(message, 'INVALID_CONFIG', { path });
    this.name = 'ConfigValidationError';
  }
}
