import { describe, it, expect } from 'vitest';
import type { ChunkRecord } from '@outline-chunks/types';
import { parseChunksJson, serializeChunksJson } from '../json-format.js';

const RECORDS: ChunkRecord[] = [
  { id: 'chunk_001', role: null, header: 'A1.1', title: 'Foo', text: 'body', precedingHeaderIds: [] },
  {
    id: 'chunk_002',
    role: null,
    header: 'A1.1.1',
    title: 'Bar',
    text: 'body2',
    precedingHeaderIds: ['A1.1'],
  },
];

describe('serializeChunksJson', () => {
  it('snake_caseのキーでJSON配列を出力する', () => {
    const parsed: unknown = JSON.parse(serializeChunksJson(RECORDS));

    expect(parsed).toEqual([
      { id: 'chunk_001', role: null, header: 'A1.1', title: 'Foo', text: 'body', preceding_header_ids: [] },
      {
        id: 'chunk_002',
        role: null,
        header: 'A1.1.1',
        title: 'Bar',
        text: 'body2',
        preceding_header_ids: ['A1.1'],
      },
    ]);
  });

  it('キー順を固定する', () => {
    const text = serializeChunksJson(RECORDS.slice(0, 1));

    expect(text.indexOf('"id"')).toBeLessThan(text.indexOf('"role"'));
    expect(text.indexOf('"role"')).toBeLessThan(text.indexOf('"header"'));
    expect(text.indexOf('"text"')).toBeLessThan(text.indexOf('"preceding_header_ids"'));
  });
});

describe('parseChunksJson', () => {
  it('出力したJSONを読み戻せる', () => {
    expect(parseChunksJson(serializeChunksJson(RECORDS))).toEqual({ ok: true, records: RECORDS });
  });

  it('不正なレコードの位置を返す', () => {
    const result = parseChunksJson('[{"id": "chunk_001"}, 3]');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.data).toEqual({ recordIndex: 0 });
    }
  });

  it('配列でない入力はエラー', () => {
    const result = parseChunksJson('{"id": "chunk_001"}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Not a chunk record array: Expected array, received object');
    }
  });
});
