/**
 * テキスト → セクション → チャンク のパイプライン
 */

import type {
  Chunk,
  OutlineChunksConfig,
  ParsingConfig,
  PipelineResult,
} from '@outline-chunks/types';
import { SectionExtractor, createPreambleRecord } from './extractor/section-extractor.js';
import { ChunkBuilder } from './chunker/chunk-builder.js';
import type { TokenCounter } from './chunker/token-counter.js';
import { normalizeText } from './normalize/page-breaks.js';
import { foldLines } from './normalize/line-folder.js';
import { LineIndex } from './extractor/line-index.js';

export type DocumentChunkerOptions = Pick<OutlineChunksConfig, 'parsing' | 'chunking'>;

/**
 * 1文書を1パスで処理する
 * 状態は呼び出しごとに閉じており、文書間で何も持ち越さない
 */
export class DocumentChunker {
  private readonly parsing: ParsingConfig;
  private readonly extractor: SectionExtractor;
  private readonly builder: ChunkBuilder;

  constructor(options: DocumentChunkerOptions, tokenCounter?: TokenCounter) {
    this.parsing = options.parsing;
    this.extractor = new SectionExtractor(options.parsing);
    this.builder = new ChunkBuilder(options.chunking, tokenCounter);
  }

  /**
   * 文書テキストを処理
   */
  process(text: string): PipelineResult {
    const normalized = normalizeText(text, this.parsing.pageBreakPattern);
    const prepared = this.parsing.foldLines ? foldLines(normalized) : normalized;

    const extraction = this.extractor.scan(prepared);
    if (extraction.status === 'no-headers') {
      return { status: 'no-headers', sections: [], chunks: this.fallback(prepared) };
    }

    return {
      status: 'ok',
      sections: extraction.sections,
      chunks: this.builder.build(extraction.sections),
    };
  }

  /**
   * 見出しがない文書の扱い
   * single-chunk の場合はテキスト全体を構造なしの1チャンクにする
   */
  private fallback(text: string): Chunk[] {
    if (this.parsing.noHeadersFallback === 'empty') {
      return [];
    }

    const body = text.trim();
    if (!body) {
      return [];
    }

    const lines = new LineIndex(text);
    return this.builder.build([
      createPreambleRecord(body, 1, lines.lineAt(Math.max(text.length - 1, 0))),
    ]);
  }
}

