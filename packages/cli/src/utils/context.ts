/**
 * コマンド共通の設定解決と入出力
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigLoader, type ResolvedConfig } from '@outline-chunks/types';

/**
 * すべてのコマンドが受け取る共通オプション
 */
export interface CommonCommandOptions {
  /** 設定ファイルのパス（グローバルオプション） */
  config?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * 設定を解決
 */
export async function resolveCommandConfig(options: CommonCommandOptions): Promise<ResolvedConfig> {
  return await ConfigLoader.resolve({ configPath: options.config, cwd: options.cwd });
}

/**
 * 入力ファイルを読み込む（相対パスはcwd基準）
 */
export async function readInputFile(file: string, cwd: string = process.cwd()): Promise<string> {
  return await fs.readFile(path.resolve(cwd, file), 'utf-8');
}

/**
 * 出力先が指定されていればファイルに、なければ標準出力に書く
 */
export async function writeOutput(
  content: string,
  outputPath: string | undefined,
  cwd: string = process.cwd()
): Promise<void> {
  if (!outputPath) {
    console.log(content.replace(/\n$/, ''));
    return;
  }

  const target = path.resolve(cwd, outputPath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, 'utf-8');
  console.log(`✓ ${target} に書き込みました`);
}
