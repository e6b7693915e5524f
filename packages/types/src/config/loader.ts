import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { OutlineChunksConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { isNotFoundError } from '../fs-errors.js';
import { validateConfig, type PartialConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 設定ファイルが必須かどうか（デフォルト: false）。trueの場合、見つからなければエラー */
  requireConfig?: boolean;
}

export interface ResolvedConfig {
  config: OutlineChunksConfig;
  configPath: string | null;
  projectRoot: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .outline-chunks.json > outline-chunks.json
 */
export const CONFIG_FILE_NAMES = ['.outline-chunks.json', 'outline-chunks.json'] as const;

/** 設定ファイルパスを指定する環境変数 */
export const CONFIG_ENV_VAR = 'OUTLINE_CHUNKS_CONFIG';

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス
   * @returns 設定オブジェクト（ファイルがなければデフォルト設定）
   */
  static async load(configPath: string = './.outline-chunks.json'): Promise<OutlineChunksConfig> {
    try {
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      const config = validateConfig(parsed);

      return this.mergeWithDefaults(config);
    } catch (error) {
      if (isNotFoundError(error)) {
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定
   * - 設定の読み込み
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd(), requireConfig = false } = options;

    // 1. 設定ファイルパスを解決
    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    if (!configPath && requireConfig) {
      throw new Error(
        'Configuration file not found. Please create a configuration file.\n' +
        'Run: outline-chunks config init'
      );
    }

    // 2. 設定の読み込み
    const config = configPath
      ? await this.load(configPath)
      : this.getDefaultConfig();

    // 3. プロジェクトルートを決定
    // 設定ファイルがあれば、その親ディレクトリ基準で project.root を解釈する
    const projectRoot = configPath
      ? await this.normalizeProjectRoot(path.resolve(path.dirname(configPath), config.project.root))
      : await this.normalizeProjectRoot(cwd);

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得
   * 呼び出し側での変更が他に波及しないよう、毎回複製して返す
   */
  static getDefaultConfig(): OutlineChunksConfig {
    return this.mergeWithDefaults({});
  }

  /**
   * 設定ファイルを探索
   */
  private static async findConfigFile(
    startDir: string = process.cwd(),
    traverseUp: boolean = true
  ): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 1. 明示的な指定 2. 環境変数 3. 自動探索
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env[CONFIG_ENV_VAR];
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - 絶対パスに変換
   * - シンボリックリンクを解決
   * - 末尾のスラッシュを削除
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      const realPath = await realpath(absolutePath);
      return realPath.replace(/\/$/, '');
    } catch (error) {
      // ディレクトリが存在しない場合は絶対パスをそのまま返す
      if (isNotFoundError(error)) {
        return absolutePath.replace(/\/$/, '');
      }
      throw error;
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: PartialConfig): OutlineChunksConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      project: {
        name: config.project?.name ?? DEFAULT_CONFIG.project.name,
        root: config.project?.root ?? DEFAULT_CONFIG.project.root,
      },
      files: {
        include: config.files?.include ?? [...DEFAULT_CONFIG.files.include],
        exclude: config.files?.exclude ?? [...DEFAULT_CONFIG.files.exclude],
        ignoreGitignore: config.files?.ignoreGitignore ?? DEFAULT_CONFIG.files.ignoreGitignore,
      },
      parsing: {
        matcherMode: config.parsing?.matcherMode ?? DEFAULT_CONFIG.parsing.matcherMode,
        preamble: config.parsing?.preamble ?? DEFAULT_CONFIG.parsing.preamble,
        pageBreakPattern:
          config.parsing?.pageBreakPattern ?? DEFAULT_CONFIG.parsing.pageBreakPattern,
        foldLines: config.parsing?.foldLines ?? DEFAULT_CONFIG.parsing.foldLines,
        noHeadersFallback:
          config.parsing?.noHeadersFallback ?? DEFAULT_CONFIG.parsing.noHeadersFallback,
      },
      chunking: {
        idPrefix: config.chunking?.idPrefix ?? DEFAULT_CONFIG.chunking.idPrefix,
        idPadding: config.chunking?.idPadding ?? DEFAULT_CONFIG.chunking.idPadding,
        trackPrecedingChunkIds:
          config.chunking?.trackPrecedingChunkIds ?? DEFAULT_CONFIG.chunking.trackPrecedingChunkIds,
        maxTokensPerChunk:
          config.chunking?.maxTokensPerChunk ?? DEFAULT_CONFIG.chunking.maxTokensPerChunk,
      },
      output: {
        format: config.output?.format ?? DEFAULT_CONFIG.output.format,
        chunksPath: config.output?.chunksPath ?? DEFAULT_CONFIG.output.chunksPath,
      },
      annotation: {
        rolesPath: config.annotation?.rolesPath ?? DEFAULT_CONFIG.annotation.rolesPath,
      },
    };
  }
}
