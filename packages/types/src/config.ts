/**
 * 設定ファイルの型定義
 */

export interface OutlineChunksConfig {
  version: string;
  project: ProjectConfig;
  files: FilesConfig;
  parsing: ParsingConfig;
  chunking: ChunkingConfig;
  output: OutputConfig;
  annotation: AnnotationConfig;
}

export interface ProjectConfig {
  /** プロジェクト名 */
  name: string;
  /** プロジェクトルート */
  root: string;
}

export interface FilesConfig {
  /** 含めるファイルパターン（glob） */
  include: string[];
  /** 除外するファイルパターン（glob） */
  exclude: string[];
  /** .gitignoreを尊重するか */
  ignoreGitignore: boolean;
}

/**
 * 見出し文法のモード
 * - strict: 最初の数字の直後に "." 必須（"1.", "A1.2"）
 * - loose: 数字パートが2つ以上（"1.2"）。行の折り畳みで使用
 */
export type MatcherMode = 'strict' | 'loose';

export interface ParsingConfig {
  /** セクション抽出に使う見出し文法 */
  matcherMode: MatcherMode;
  /** 最初の見出しより前のテキストの扱い */
  preamble: 'discard' | 'record';
  /** ページ区切りマーカーの正規表現（ソース文字列） */
  pageBreakPattern: string;
  /** 抽出前に見出しブロックを1行に折り畳むか */
  foldLines: boolean;
  /** 見出しが1つもない場合の扱い */
  noHeadersFallback: 'empty' | 'single-chunk';
}

export interface ChunkingConfig {
  /** チャンクIDの接頭辞 */
  idPrefix: string;
  /** チャンクIDのゼロ埋め桁数（3未満は3として扱う） */
  idPadding: number;
  /** 祖先チャンクIDを記録するか */
  trackPrecedingChunkIds: boolean;
  /** チャンクあたりの最大トークン数（超過時は警告のみ） */
  maxTokensPerChunk: number;
}

export type OutputFormat = 'records' | 'json';

export interface OutputConfig {
  /** chunks コマンドのデフォルト出力形式 */
  format: OutputFormat;
  /** batch コマンドの保存先 */
  chunksPath: string;
}

export interface AnnotationConfig {
  /** ロールカタログ（JSON）のパス */
  rolesPath: string | null;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: OutlineChunksConfig = {
  version: '1.0',
  project: {
    name: '',
    root: '.',
  },
  files: {
    include: ['**/*.txt'],
    exclude: ['**/node_modules/**', '**/.git/**', '**/dist/**', '**/.outline-chunks/**'],
    ignoreGitignore: true,
  },
  parsing: {
    matcherMode: 'strict',
    preamble: 'discard',
    pageBreakPattern: '--- PAGE \\d+ ---\\n?',
    foldLines: false,
    noHeadersFallback: 'empty',
  },
  chunking: {
    idPrefix: 'chunk_',
    idPadding: 3,
    trackPrecedingChunkIds: true,
    maxTokensPerChunk: 2000,
  },
  output: {
    format: 'records',
    chunksPath: '.outline-chunks/chunks',
  },
  annotation: {
    rolesPath: null,
  },
};
