import { z } from 'zod';
import { MalformedRecordBoundaryError, type ChunkRecord } from '@outline-chunks/types';
import { wireChunkRecordSchema } from '../schemas.js';
import type { ParseChunkRecordsResult } from './result.js';
import { describeIssue, fromWireRecord, toWireRecord } from './wire.js';

const wireChunkRecordsSchema = z.array(wireChunkRecordSchema);

/**
 * チャンク列をJSON配列に変換（キー順はレコードテキスト形式と同じ）
 */
export function serializeChunksJson(records: readonly ChunkRecord[]): string {
  return `${JSON.stringify(records.map(toWireRecord), null, 2)}\n`;
}

/**
 * JSON配列のチャンク列を読み込む
 */
export function parseChunksJson(text: string): ParseChunkRecordsResult {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new MalformedRecordBoundaryError(`Invalid JSON: ${reason}`) };
  }

  const parsed = wireChunkRecordsSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const recordIndex = typeof issue?.path[0] === 'number' ? issue.path[0] : undefined;
    return {
      ok: false,
      error: new MalformedRecordBoundaryError(
        `Not a chunk record array: ${describeIssue(issue)}`,
        recordIndex === undefined ? undefined : { recordIndex }
      ),
    };
  }

  return { ok: true, records: parsed.data.map(fromWireRecord) };
}
