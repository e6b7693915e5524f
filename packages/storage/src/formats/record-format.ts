/**
 * レコードテキスト形式
 *
 * チャンク1件を4スペースインデントのJSONオブジェクト1つで表し、
 * ブロック間を "\n---\n\n" で区切る。文字列はJSONエスケープされるので、
 * 本文中の波括弧・引用符・改行が区切りと誤認されることはない。
 */

import { MalformedRecordBoundaryError, type ChunkRecord } from '@outline-chunks/types';
import { wireChunkRecordSchema } from '../schemas.js';
import type { ParseChunkRecordsResult } from './result.js';
import { describeIssue, fromWireRecord, toWireRecord } from './wire.js';

export const RECORD_SEPARATOR = '\n---\n\n';

const RECORD_INDENT = 4;

/**
 * チャンク列をレコードテキストに変換
 * 読み込み側と同じスキーマで検証し、読み戻せないレコード（空のIDなど）は例外にする
 */
export function serializeChunkRecords(records: readonly ChunkRecord[]): string {
  if (records.length === 0) {
    return '';
  }

  const blocks = records.map((record, recordIndex) => {
    const wire = toWireRecord(record);

    const checked = wireChunkRecordSchema.safeParse(wire);
    if (!checked.success) {
      throw new MalformedRecordBoundaryError(
        `Chunk "${record.id}" cannot be read back: ${describeIssue(checked.error.issues[0])}`,
        { recordIndex, chunkId: record.id }
      );
    }

    return JSON.stringify(wire, null, RECORD_INDENT);
  });

  return `${blocks.join(RECORD_SEPARATOR)}\n`;
}

/**
 * レコードテキストを読み込む
 * 例外は投げず、最初の不正なブロックをエラーとして返す
 */
export function parseChunkRecords(text: string): ParseChunkRecordsResult {
  const normalized = text.replace(/\r\n?/g, '\n').trim();
  if (!normalized) {
    return { ok: true, records: [] };
  }

  const records: ChunkRecord[] = [];
  const blocks = normalized.split(/\n---\n+/);

  for (const [recordIndex, block] of blocks.entries()) {
    let value: unknown;
    try {
      value = JSON.parse(block);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        error: new MalformedRecordBoundaryError(`Record ${recordIndex} is not valid JSON: ${reason}`, {
          recordIndex,
        }),
      };
    }

    const parsed = wireChunkRecordSchema.safeParse(value);
    if (!parsed.success) {
      return {
        ok: false,
        error: new MalformedRecordBoundaryError(
          `Record ${recordIndex} is not a chunk record: ${describeIssue(parsed.error.issues[0])}`,
          { recordIndex }
        ),
      };
    }

    records.push(fromWireRecord(parsed.data));
  }

  return { ok: true, records };
}
