/**
 * chunks コマンド
 * 祖先の見出しを記録したチャンクを出力する
 */

import type { OutputFormat } from '@outline-chunks/types';
import { serializeChunkRecords, serializeChunksJson } from '@outline-chunks/storage';
import { formatChunksAsText } from '../utils/output.js';
import { writeOutput } from '../utils/context.js';
import { exitWithError } from '../utils/errors.js';
import { processFile, type ProcessFileOptions } from './process.js';

export type ChunksFormat = 'text' | OutputFormat;

export interface ChunksCommandOptions extends ProcessFileOptions {
  /** 未指定の場合、標準出力ではtext、ファイル出力では設定のoutput.format */
  format?: ChunksFormat;
  output?: string;
}

/**
 * チャンクを構築して出力文字列を返す
 */
export async function runChunks(file: string, options: ChunksCommandOptions): Promise<string> {
  const { config, result } = await processFile(file, options);
  const format = options.format ?? (options.output ? config.output.format : 'text');

  switch (format) {
    case 'records':
      return serializeChunkRecords(result.chunks);
    case 'json':
      return serializeChunksJson(result.chunks);
    case 'text':
      return formatChunksAsText(result.chunks);
    default:
      throw new Error(`Unknown format: ${String(format)} (text, records, json)`);
  }
}

/**
 * chunks コマンドを実行
 */
export async function executeChunks(file: string, options: ChunksCommandOptions): Promise<void> {
  try {
    const output = await runChunks(file, options);
    await writeOutput(output, options.output, options.cwd);
  } catch (error) {
    exitWithError(error);
  }
}
