#!/usr/bin/env node
/**
 * outline-chunks CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { CONFIG_ENV_VAR } from '@outline-chunks/types';
import { executeSections, type SectionsCommandOptions } from './commands/sections.js';
import { executeChunks, type ChunksCommandOptions } from './commands/chunks.js';
import { executeFold, type FoldCommandOptions } from './commands/fold.js';
import { executeBatch } from './commands/batch.js';
import { executeAnnotate, type AnnotateCommandOptions } from './commands/annotate.js';
import { executeRoles, type RolesCommandOptions } from './commands/roles.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as {
  version: string;
};

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const program = new Command();

program
  .name('outline-chunks')
  .description('番号付き見出しのテキストをセクション・チャンクに分割するツール')
  .version(packageJson.version)
  .addOption(
    new Option('-c, --config <path>', '設定ファイルのパス')
      .env(CONFIG_ENV_VAR)
  )
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

// sections コマンド
program
  .command('sections')
  .description('見出しごとのセクションと階層情報を出力')
  .argument('<file>', '抽出済みテキストファイル')
  .addOption(
    new Option('--format <format>', '出力形式').choices(['text', 'json', 'csv']).default('text')
  )
  .option('-o, --output <path>', '出力先ファイル（省略時は標準出力）')
  .option('--preamble', '最初の見出しより前のテキストもレコードにする')
  .action((file: string, options: SectionsCommandOptions) => {
    void executeSections(file, { ...options, config: globalConfigPath });
  });

// chunks コマンド
program
  .command('chunks')
  .description('祖先の見出しを記録したチャンクを出力')
  .argument('<file>', '抽出済みテキストファイル')
  .addOption(
    new Option('--format <format>', '出力形式（省略時: 標準出力はtext、ファイル出力は設定のoutput.format）')
      .choices(['text', 'records', 'json'])
  )
  .option('-o, --output <path>', '出力先ファイル（省略時は標準出力）')
  .option('--preamble', '最初の見出しより前のテキストもチャンクにする')
  .action((file: string, options: ChunksCommandOptions) => {
    void executeChunks(file, { ...options, config: globalConfigPath });
  });

// fold コマンド
program
  .command('fold')
  .description('物理行を見出し単位の論理行に折り畳む')
  .argument('<file>', '抽出済みテキストファイル')
  .option('-o, --output <path>', '出力先ファイル（省略時は標準出力）')
  .action((file: string, options: FoldCommandOptions) => {
    void executeFold(file, { ...options, config: globalConfigPath });
  });

// batch コマンド
program
  .command('batch')
  .description('設定のパターンに合うファイルをチャンク化して保存')
  .argument('[paths...]', '処理するファイルのパス（プロジェクトルートからの相対パス）')
  .option('--force', '内容が変わっていないファイルも再処理')
  .action((paths: string[], options: { force?: boolean }) => {
    void executeBatch({ paths, ...options, config: globalConfigPath });
  });

// annotate コマンド
program
  .command('annotate')
  .description('チャンクレコードの空のroleをロールカタログで埋める')
  .argument('<records-file>', 'チャンクレコードのファイル（.jsonならJSON配列）')
  .option('--roles <path>', 'ロールカタログ（JSON）のパス')
  .option('-o, --output <path>', '出力先ファイル（省略時は標準出力）')
  .action((recordsFile: string, options: AnnotateCommandOptions) => {
    void executeAnnotate(recordsFile, { ...options, config: globalConfigPath });
  });

// roles コマンド
program
  .command('roles')
  .description('文書中の "名前 (略称)" からロールカタログ（JSON）を作る')
  .argument('<file>', '抽出済みテキストファイル')
  .option('--section <number>', 'このセクションとその子孫だけから抽出（例: 2）')
  .option('-o, --output <path>', '出力先ファイル（省略時は標準出力）')
  .action((file: string, options: RolesCommandOptions) => {
    void executeRoles(file, { ...options, config: globalConfigPath });
  });

// config コマンド
const configCmd = program
  .command('config')
  .description('設定管理');

configCmd
  .command('init')
  .description('設定ファイルを初期化')
  .option('-f, --force', '既存ファイルを上書き')
  .action(async (options: { force?: boolean }) => {
    const { initConfig } = await import('./commands/config/init.js');
    try {
      await initConfig(options);
    } catch (error) {
      const { exitWithError } = await import('./utils/errors.js');
      exitWithError(error);
    }
  });

// コマンドラインを解析
program.parse(process.argv);
