import type { MatcherMode } from '@outline-chunks/types';
import { findHeaders } from '../matcher/header-matcher.js';

function flatten(block: string): string {
  return block.replace(/\n/g, ' ').trim();
}

/**
 * 物理行のレイアウトを論理行に折り畳む
 *
 * 見出しから次の見出しの直前までを1行にまとめる。最初の見出しより前のテキストは
 * それ自体で1行になり、見出しがまったくない場合はテキスト全体が1行になる。
 * 本文中の数字で始まる文を見出しと誤認しないよう、デフォルトはlooseモード。
 */
export function foldLines(text: string, mode: MatcherMode = 'loose'): string {
  if (!text) {
    return '';
  }

  const matches = findHeaders(text, mode);
  if (matches.length === 0) {
    return flatten(text);
  }

  const lines: string[] = [];

  const preamble = flatten(text.slice(0, matches[0].start));
  if (preamble) {
    lines.push(preamble);
  }

  matches.forEach((match, i) => {
    const end = i + 1 < matches.length ? matches[i + 1].start : text.length;
    const block = flatten(text.slice(match.start, end));
    if (block) {
      lines.push(block);
    }
  });

  return lines.join('\n');
}
