import type { HeaderToken, MatcherMode } from '@outline-chunks/types';

/**
 * 見出し番号トークンの文法（モード別）
 *
 * strict: 任意の "A" + 1〜2桁 + "." + (1〜2桁 + 任意の ".")*
 *         例: "1.", "1.2", "2.3.1.", "A1.1.1"
 * loose:  任意の "A" + 1〜2桁 + ("." + 1〜2桁){1,3} + 任意の "."
 *         数字パートが2つ以上必要なので "1" や "1." は拒否する
 */
export const TOKEN_PATTERNS: Readonly<Record<MatcherMode, string>> = {
  strict: 'A?\\d{1,2}\\.(?:\\d{1,2}\\.?)*',
  loose: 'A?\\d{1,2}(?:\\.\\d{1,2}){1,3}\\.?',
};

/**
 * 見出しのマッチ結果
 */
export interface HeaderMatch {
  token: HeaderToken;
  /** 見出し行の残り（トリム済み） */
  title: string;
  /** 見出し行の開始オフセット */
  start: number;
  /** 見出し行の終了オフセット（改行を含まない） */
  end: number;
}

/**
 * 行頭にアンカーした見出しの正規表現を生成
 * タイトルは同じ行の残りだけ（次の行にはまたがらない）
 *
 * 行区切りは "\n" のみ。`m` フラグの `^`/`$` や `.` は U+2028/U+2029 でも
 * 行を切るため使わない（LineIndex の行番号とずれる）
 */
function createHeaderPattern(mode: MatcherMode, flags: string): RegExp {
  return new RegExp(`(?<![^\\n])(?<number>${TOKEN_PATTERNS[mode]})[ \\t]*(?<title>[^\\n]*)`, flags);
}

/**
 * 生トークンを正規形に変換（末尾の区切り文字を除去）
 */
export function canonicalizeToken(raw: string): string {
  return raw.trim().replace(/\.+$/, '');
}

function toHeaderMatch(match: RegExpExecArray | RegExpMatchArray, start: number): HeaderMatch {
  const raw = match.groups?.number ?? '';
  return {
    token: { raw, canonical: canonicalizeToken(raw) },
    title: (match.groups?.title ?? '').trim(),
    start,
    end: start + match[0].length,
  };
}

/**
 * 1行が見出しで始まるか判定
 * @returns 見出しでなければnull（本文行では普通のこと）
 */
export function matchHeader(line: string, mode: MatcherMode): HeaderMatch | null {
  const firstLine = line.split('\n', 1)[0] ?? '';
  const match = createHeaderPattern(mode, '').exec(firstLine);
  return match ? toHeaderMatch(match, 0) : null;
}

/**
 * テキスト全体から見出しを文書順にすべて検出
 */
export function findHeaders(text: string, mode: MatcherMode): HeaderMatch[] {
  const matches: HeaderMatch[] = [];

  for (const match of text.matchAll(createHeaderPattern(mode, 'g'))) {
    matches.push(toHeaderMatch(match, match.index ?? 0));
  }

  return matches;
}
