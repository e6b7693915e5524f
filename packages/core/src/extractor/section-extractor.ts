import {
  InvalidTokenError,
  type ExtractionResult,
  type HierarchyInfo,
  type ParsingConfig,
  type RecordFlag,
  type SectionRecord,
} from '@outline-chunks/types';
import { findHeaders, type HeaderMatch } from '../matcher/header-matcher.js';
import { resolveHierarchy, TOKEN_SEPARATOR } from '../hierarchy/hierarchy-resolver.js';
import { normalizeText } from '../normalize/page-breaks.js';
import { LineIndex } from './line-index.js';

export type SectionExtractorOptions = Pick<ParsingConfig, 'matcherMode' | 'preamble' | 'pageBreakPattern'>;

/**
 * 前文（最初の見出しより前のテキスト）のレコードを生成
 */
export function createPreambleRecord(content: string, startLine: number, endLine: number): SectionRecord {
  return {
    kind: 'preamble',
    number: '',
    rawNumber: '',
    title: '',
    content,
    level: 0,
    parentNumber: null,
    ancestry: [],
    startLine,
    endLine,
    flags: [],
  };
}

/**
 * 番号付き見出しでテキストをセクションに分割するクラス
 *
 * 番号の単調性や欠番は検証しない。"1.2" から "1.9" へ飛んだり "2.1" が
 * 重複したりしても、そのまま別々のレコードとして文書順に出力する。
 */
export class SectionExtractor {
  constructor(
    private readonly options: SectionExtractorOptions,
    private readonly resolver: (token: string) => HierarchyInfo = resolveHierarchy
  ) {}

  /**
   * テキストを正規化してからセクションを抽出
   */
  extract(text: string): ExtractionResult {
    return this.scan(normalizeText(text, this.options.pageBreakPattern));
  }

  /**
   * 正規化済みテキストからセクションを抽出
   * 見出しが1つもない場合は例外ではなく status: 'no-headers' を返す
   */
  scan(text: string): ExtractionResult {
    const matches = findHeaders(text, this.options.matcherMode);
    if (matches.length === 0) {
      return { status: 'no-headers', sections: [] };
    }

    const lines = new LineIndex(text);
    const sections: SectionRecord[] = [];

    // 前文
    if (this.options.preamble === 'record') {
      const preamble = text.slice(0, matches[0].start).trim();
      if (preamble) {
        sections.push(
          createPreambleRecord(preamble, 1, lines.lineAt(Math.max(matches[0].start - 1, 0)))
        );
      }
    }

    matches.forEach((match, i) => {
      const end = i + 1 < matches.length ? matches[i + 1].start : text.length;
      sections.push(this.buildSection(text, match, end, lines));
    });

    return { status: 'ok', sections };
  }

  private buildSection(text: string, match: HeaderMatch, end: number, lines: LineIndex): SectionRecord {
    const { info, flags } = this.resolve(match.token.canonical);

    return {
      kind: 'section',
      number: match.token.canonical,
      rawNumber: match.token.raw,
      title: match.title,
      content: text.slice(match.end, end).trim(),
      level: info.level,
      parentNumber: info.parent,
      ancestry: info.ancestry,
      startLine: lines.lineAt(match.start),
      endLine: lines.lineAt(Math.max(end - 1, match.start)),
      flags,
    };
  }

  /**
   * 階層情報を解決
   * 解析できないトークンでもレコードは捨てず、フラグを付けて出力する
   */
  private resolve(token: string): { info: HierarchyInfo; flags: RecordFlag[] } {
    try {
      return { info: this.resolver(token), flags: [] };
    } catch (error) {
      if (!(error instanceof InvalidTokenError)) {
        throw error;
      }
      console.warn(`Invalid header token "${token}": emitting section without ancestry`);
      const parts = token.split(TOKEN_SEPARATOR).filter((part) => part.length > 0);
      return {
        info: { level: Math.max(parts.length, 1), parent: null, ancestry: [] },
        flags: ['invalid-token'],
      };
    }
  }
}
