/**
 * セクションデータの型定義
 *
 * Note: 抽出パスで一度だけ生成され、以後は変更しない（イミュータブル）
 */

/**
 * レコードに付与されるフラグ
 * - invalid-token: 番号トークンを階層解析できなかった（レコード自体は出力する）
 * - lineage-mismatch: スタック上の祖先が番号上の祖先と一致しない
 */
export type RecordFlag = 'invalid-token' | 'lineage-mismatch';

/**
 * 見出し番号トークン
 */
export interface HeaderToken {
  /** マッチした生テキスト（末尾の "." を含む場合がある） */
  raw: string;
  /** 正規形（末尾の区切り文字を除去したもの） */
  canonical: string;
}

/**
 * 階層情報
 */
export interface HierarchyInfo {
  /** 番号のパート数 */
  level: number;
  /** 直近の親番号（レベル1ではnull） */
  parent: string | null;
  /** ルートから直近の親までの祖先番号 */
  ancestry: string[];
}

export interface SectionRecord {
  /** 通常の見出しセクションか、最初の見出しより前の前文か */
  kind: 'section' | 'preamble';
  /** 正規形の番号（前文は空文字） */
  number: string;
  /** マッチしたままの番号 */
  rawNumber: string;
  /** 見出し行の残り（空の場合あり） */
  title: string;
  /** 見出し行の次から次の見出しの直前までのテキスト */
  content: string;
  /** 番号のパート数（前文は0） */
  level: number;
  /** 親番号 */
  parentNumber: string | null;
  /** 祖先番号（ルートから順） */
  ancestry: string[];
  /** 開始行（1-indexed、正規化後のテキスト基準） */
  startLine: number;
  /** 終了行（1-indexed） */
  endLine: number;
  flags: RecordFlag[];
}
