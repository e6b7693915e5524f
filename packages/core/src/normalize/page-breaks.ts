import { DEFAULT_CONFIG } from '@outline-chunks/types';

/**
 * 改行コードをLFに統一
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/**
 * ページ区切りマーカー（例: "--- PAGE 3 ---"）を除去
 * 見出しとして扱われたり、セクション本文を分断したりしないよう、走査前に取り除く
 */
export function stripPageBreaks(
  text: string,
  pattern: string = DEFAULT_CONFIG.parsing.pageBreakPattern
): string {
  return text.replace(new RegExp(pattern, 'gm'), '');
}

/**
 * 見出し走査用にテキストを正規化
 */
export function normalizeText(text: string, pageBreakPattern?: string): string {
  return stripPageBreaks(normalizeLineEndings(text), pageBreakPattern);
}
