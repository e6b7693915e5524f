/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigLoader, isNotFoundError, type OutlineChunksConfig } from '@outline-chunks/types';

export interface ConfigInitOptions {
  /** プロジェクトルート（デフォルト: cwd） */
  projectRoot?: string;
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * デフォルト設定オブジェクトを生成
 */
function createDefaultConfig(projectRoot: string): OutlineChunksConfig {
  const config = ConfigLoader.getDefaultConfig();
  return {
    ...config,
    project: {
      name: path.basename(path.resolve(projectRoot)),
      root: '.',
    },
  };
}

/**
 * config init コマンドを実行
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<void> {
  const cwd = options.cwd || process.cwd();
  const projectRoot = options.projectRoot || cwd;
  const configPath = path.join(cwd, '.outline-chunks.json');

  console.log('Initializing outline-chunks configuration...\n');

  // 既存ファイルチェック
  try {
    await fs.access(configPath);

    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` +
        'Use --force to overwrite the existing file.'
      );
    }

    console.log('⚠️  Overwriting existing configuration file...\n');
  } catch (error) {
    // ファイルが存在しない場合は正常（続行）
    if (!isNotFoundError(error)) {
      throw error;
    }
  }

  // 設定オブジェクト生成
  const config = createDefaultConfig(projectRoot);

  // ファイル書き込み
  const configContent = JSON.stringify(config, null, 2) + '\n';
  await fs.writeFile(configPath, configContent, 'utf-8');

  console.log('✅ Configuration file created successfully!\n');
  console.log(`📄 File: ${configPath}`);
  console.log(`🚀 Project: ${config.project.name}`);
  console.log(`📁 Root: ${projectRoot}\n`);
  console.log('Next steps:');
  console.log('  1. Review and customize .outline-chunks.json');
  console.log('  2. Inspect a document: outline-chunks sections <file>');
  console.log('  3. Chunk all documents: outline-chunks batch\n');
}
