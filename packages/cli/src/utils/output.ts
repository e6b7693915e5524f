/**
 * 出力フォーマットユーティリティ
 */

import type { Chunk, SectionRecord } from '@outline-chunks/types';

/**
 * コンテンツのプレビューを取得（行ベース）
 */
function getPreviewContent(content: string, maxLines: number = 5): string {
  const lines = content.split('\n');

  if (lines.length <= maxLines) {
    return content;
  }

  const previewLines = lines.slice(0, maxLines);
  const remaining = lines.length - maxLines;
  previewLines.push(`... (残り${remaining}行)`);

  return previewLines.join('\n');
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n');
}

function formatFlags(flags: readonly string[]): string | null {
  return flags.length > 0 ? `Flags: ${flags.join(', ')}` : null;
}

/**
 * セクション一覧をテキスト形式で出力
 */
export function formatSectionsAsText(sections: readonly SectionRecord[], previewLines: number = 5): string {
  if (sections.length === 0) {
    return 'セクション: 0件（番号付きの見出しが見つかりませんでした）';
  }

  const lines: string[] = [`セクション: ${sections.length}件\n`];

  for (const section of sections) {
    const label = section.kind === 'preamble' ? '(前文)' : section.rawNumber;
    lines.push(section.title ? `${label} ${section.title}` : label);

    const metaParts = [
      `Level: ${section.level}`,
      `Parent: ${section.parentNumber ?? '-'}`,
      `Ancestry: ${section.ancestry.length > 0 ? section.ancestry.join(' > ') : '-'}`,
      `Line: ${section.startLine}-${section.endLine}`,
    ];
    const flags = formatFlags(section.flags);
    if (flags) {
      metaParts.push(flags);
    }
    lines.push(metaParts.join(' | '));

    if (section.content) {
      lines.push(indent(getPreviewContent(section.content, previewLines)));
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * チャンク一覧をテキスト形式で出力
 */
export function formatChunksAsText(chunks: readonly Chunk[], previewLines: number = 5): string {
  if (chunks.length === 0) {
    return 'チャンク: 0件（番号付きの見出しが見つかりませんでした）';
  }

  const lines: string[] = [`チャンク: ${chunks.length}件\n`];

  for (const chunk of chunks) {
    const header = chunk.header || '(前文)';
    lines.push(`[${chunk.id}] ${chunk.title ? `${header} ${chunk.title}` : header}`);

    const metaParts = [
      `Preceding: ${chunk.precedingHeaderIds.length > 0 ? chunk.precedingHeaderIds.join(' > ') : '-'}`,
      `Tokens: ${chunk.tokenCount}`,
      `Line: ${chunk.startLine}-${chunk.endLine}`,
    ];
    if (chunk.role) {
      metaParts.push(`Role: ${chunk.role}`);
    }
    const flags = formatFlags(chunk.flags);
    if (flags) {
      metaParts.push(flags);
    }
    lines.push(metaParts.join(' | '));

    if (chunk.text) {
      lines.push(indent(getPreviewContent(chunk.text, previewLines)));
    }
    lines.push('');
  }

  return lines.join('\n');
}
