/**
 * チャンクデータの型定義
 */

import type { RecordFlag } from './section.js';

/**
 * シリアライズ境界でやり取りするチャンクレコード
 * 外部のアノテータはこの形だけを前提にする
 */
export interface ChunkRecord {
  /** チャンクID（chunk_001, chunk_002, ...） */
  id: string;
  /** 分類ラベル。コアは常にnullで初期化し、外部アノテータが埋める */
  role: string | null;
  /** 捕捉したままの見出し番号（例: "1.", "A1.1"） */
  header: string;
  /** 見出し行の残り */
  title: string;
  /** 本文（空文字の場合あり） */
  text: string;
  /** 生成時点でスタックに積まれていた祖先の見出し番号（ルートから順） */
  precedingHeaderIds: string[];
  /** 祖先の見出しに対応するチャンクID（追跡が有効な場合のみ） */
  precedingChunkIds?: string[];
}

export interface Chunk extends ChunkRecord {
  /** 正規形の番号 */
  number: string;
  /** 番号のパート数 */
  level: number;
  /** 番号から導出した祖先 */
  ancestry: string[];
  /** トークン数 */
  tokenCount: number;
  startLine: number;
  endLine: number;
  flags: RecordFlag[];
}

/**
 * ソースファイル単位で保存されるチャンク集合
 */
export interface ChunkSet {
  /** ソースファイルのパス（キー） */
  sourcePath: string;
  /** ソーステキストのハッシュ（sha256） */
  sourceHash: string;
  /** 作成日時 */
  createdAt: Date;
  chunks: Chunk[];
}
