import type { ChunkRecord, MalformedRecordBoundaryError } from '@outline-chunks/types';

/**
 * チャンクレコードの読み込み結果
 */
export type ParseChunkRecordsResult =
  | { ok: true; records: ChunkRecord[] }
  | { ok: false; error: MalformedRecordBoundaryError };
