import type { Chunk, ChunkingConfig, RecordFlag, SectionRecord } from '@outline-chunks/types';
import { TokenCounter } from './token-counter.js';

/** チャンクIDの最小桁数 */
const MIN_ID_PADDING = 3;

/**
 * スタックに積まれている見出し
 */
interface OpenHeader {
  /** 捕捉したままの番号 */
  header: string;
  /** 正規形の番号 */
  number: string;
  level: number;
  chunkId: string;
}

/**
 * セクション列からチャンクを構築するクラス
 *
 * 見出しのスタックを1パスで管理し、各チャンクに「生成時点で開いていた祖先」を記録する。
 * 深さは常にトークン自身のパート数で、スタック上の位置ではない。
 * 構造上の系譜（スタック）を正とし、番号上の祖先とずれた場合は lineage-mismatch を付ける。
 */
export class ChunkBuilder {
  private readonly tokenCounter: TokenCounter;

  constructor(
    private readonly config: ChunkingConfig,
    tokenCounter?: TokenCounter
  ) {
    this.tokenCounter = tokenCounter ?? new TokenCounter();
  }

  /**
   * セクション列（文書順）をチャンク列に変換
   */
  build(sections: readonly SectionRecord[]): Chunk[] {
    const stack: OpenHeader[] = [];
    const chunks: Chunk[] = [];

    for (const section of sections) {
      const id = this.formatId(chunks.length + 1);

      // 前文はスタックに積まない
      if (section.kind === 'preamble') {
        chunks.push(this.createChunk(id, section, []));
        continue;
      }

      // 1. 同じか深い見出しを閉じる
      while (stack.length > 0 && stack[stack.length - 1].level >= section.level) {
        stack.pop();
      }

      // 2. 現在の祖先を記録
      const open = [...stack];

      // 3. 自分を積む
      stack.push({
        header: section.rawNumber,
        number: section.number,
        level: section.level,
        chunkId: id,
      });

      chunks.push(this.createChunk(id, section, open));
    }

    return chunks;
  }

  /**
   * 連番からチャンクIDを生成（例: chunk_001）
   */
  formatId(sequence: number): string {
    const width = Math.max(this.config.idPadding, MIN_ID_PADDING);
    return `${this.config.idPrefix}${String(sequence).padStart(width, '0')}`;
  }

  private createChunk(id: string, section: SectionRecord, open: readonly OpenHeader[]): Chunk {
    const flags: RecordFlag[] = [...section.flags];
    if (open.some((ancestor) => !section.ancestry.includes(ancestor.number))) {
      flags.push('lineage-mismatch');
    }

    const text = chunkTextOf(section);
    const tokenCount = this.tokenCounter.count(text);
    if (tokenCount > this.config.maxTokensPerChunk) {
      console.warn(
        `Chunk "${id}" (${section.rawNumber || 'preamble'}) exceeds maxTokensPerChunk (${tokenCount} > ${this.config.maxTokensPerChunk})`
      );
    }

    return {
      id,
      role: null,
      header: section.rawNumber,
      title: section.title,
      text,
      precedingHeaderIds: open.map((ancestor) => ancestor.header),
      ...(this.config.trackPrecedingChunkIds
        ? { precedingChunkIds: open.map((ancestor) => ancestor.chunkId) }
        : {}),
      number: section.number,
      level: section.level,
      ancestry: section.ancestry,
      tokenCount,
      startLine: section.startLine,
      endLine: section.endLine,
      flags,
    };
  }
}

/**
 * チャンク本文: 見出し行の残り（タイトル）とセクション本文を連結したもの
 * 1行に折りたたんだ入力では本文がすべて見出し行に載るため、タイトルも含める
 */
function chunkTextOf(section: SectionRecord): string {
  return [section.title, section.content].filter((part) => part.length > 0).join('\n');
}
