import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import { minimatch } from 'minimatch';
import { isNotFoundError, type FilesConfig } from '@outline-chunks/types';

// ignoreパッケージの型定義（手動）
interface Ignore {
  add(pattern: string | string[]): this;
  ignores(pathname: string): boolean;
}

// ignoreパッケージのファクトリ関数をdynamic importで使用
let ignoreFactory: (() => Ignore) | null = null;

export interface FileDiscoveryOptions {
  /** プロジェクトルート */
  rootDir: string;
  /** ファイル検索設定 */
  config: FilesConfig;
}

/**
 * minimatchはfast-globと異なり、**\/patternがルートレベルにマッチしない
 * fast-globの挙動に合わせるため、ルートレベルとネストレベルの両方をチェック
 */
function matchesGlob(filePath: string, pattern: string): boolean {
  if (pattern.startsWith('**/')) {
    return minimatch(filePath, pattern) || minimatch(filePath, pattern.slice(3));
  }
  return minimatch(filePath, pattern);
}

/**
 * ファイル検索クラス
 * Globパターンと.gitignoreを使用して抽出済みテキストファイルを検索
 */
export class FileDiscovery {
  private rootDir: string;
  private config: FilesConfig;
  private ignoreFilter: Ignore | null = null;

  constructor(options: FileDiscoveryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config;
  }

  /**
   * ファイルを検索
   * @returns 見つかったファイルのパス一覧（プロジェクトルートからの相対パス、ソート済み）
   */
  async findFiles(): Promise<string[]> {
    await this.loadGitignore();

    const files = await fg(this.config.include, {
      cwd: this.rootDir,
      ignore: this.config.exclude,
      absolute: false,
      onlyFiles: true,
      dot: false,
    });

    return files.filter((file) => !this.isGitignored(file)).sort();
  }

  /**
   * 指定されたパスのうち、設定のパターンに合うものだけを残す
   * @param filePaths プロジェクトルートからの相対パス
   */
  async filter(filePaths: string[]): Promise<string[]> {
    await this.loadGitignore();
    return filePaths
      .map((filePath) => filePath.replace(/\\/g, '/'))
      .filter((filePath) => !this.shouldIgnore(filePath));
  }

  /**
   * パスがinclude/excludeパターンにマッチするか判定
   */
  matchesPattern(filePath: string): boolean {
    const matchesInclude = this.config.include.some((pattern) => matchesGlob(filePath, pattern));
    if (!matchesInclude) {
      return false;
    }

    return !this.config.exclude.some((pattern) => matchesGlob(filePath, pattern));
  }

  /**
   * パスを除外すべきか判定
   */
  shouldIgnore(filePath: string): boolean {
    return this.isGitignored(filePath) || !this.matchesPattern(filePath);
  }

  private isGitignored(filePath: string): boolean {
    return this.config.ignoreGitignore && this.ignoreFilter !== null && this.ignoreFilter.ignores(filePath);
  }

  /**
   * .gitignoreを読み込む
   */
  private async loadGitignore(): Promise<void> {
    if (!this.config.ignoreGitignore || this.ignoreFilter) {
      return;
    }

    try {
      if (!ignoreFactory) {
        const ignoreModule = await import('ignore');
        ignoreFactory = ignoreModule.default as unknown as () => Ignore;
      }

      const gitignorePath = path.join(this.rootDir, '.gitignore');
      const content = await fs.readFile(gitignorePath, 'utf-8');
      this.ignoreFilter = ignoreFactory().add(content);
    } catch (error) {
      // .gitignoreが存在しない場合は無視
      if (!isNotFoundError(error)) {
        throw error;
      }
    }
  }
}
