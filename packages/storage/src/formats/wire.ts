import type { ChunkRecord } from '@outline-chunks/types';
import type { WireChunkRecord } from '../schemas.js';

/**
 * チャンクをワイヤ形式に変換
 * キー順は id, role, header, title, text, preceding_header_ids[, preceding_chunk_ids] で固定
 */
export function toWireRecord(record: ChunkRecord): WireChunkRecord {
  return {
    id: record.id,
    role: record.role,
    header: record.header,
    title: record.title,
    text: record.text,
    preceding_header_ids: [...record.precedingHeaderIds],
    ...(record.precedingChunkIds ? { preceding_chunk_ids: [...record.precedingChunkIds] } : {}),
  };
}

export function fromWireRecord(wire: WireChunkRecord): ChunkRecord {
  return {
    id: wire.id,
    role: wire.role,
    header: wire.header,
    title: wire.title,
    text: wire.text,
    precedingHeaderIds: wire.preceding_header_ids,
    ...(wire.preceding_chunk_ids ? { precedingChunkIds: wire.preceding_chunk_ids } : {}),
  };
}

export function describeIssue(issue: { path: (string | number)[]; message: string } | undefined): string {
  if (!issue) {
    return 'unknown error';
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}
