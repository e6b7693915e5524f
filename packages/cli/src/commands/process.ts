/**
 * sections / chunks コマンドで共通の文書処理
 */

import type { OutlineChunksConfig, PipelineResult } from '@outline-chunks/types';
import { DocumentChunker } from '@outline-chunks/core';
import { readInputFile, resolveCommandConfig, type CommonCommandOptions } from '../utils/context.js';

export interface ProcessFileOptions extends CommonCommandOptions {
  /** 前文をレコードとして出力する */
  preamble?: boolean;
}

export interface ProcessedFile {
  config: OutlineChunksConfig;
  result: PipelineResult;
}

/**
 * 設定を解決し、ファイルを1つ処理する
 */
export async function processFile(file: string, options: ProcessFileOptions): Promise<ProcessedFile> {
  const { config } = await resolveCommandConfig(options);
  const parsing = options.preamble ? { ...config.parsing, preamble: 'record' as const } : config.parsing;

  const text = await readInputFile(file, options.cwd);
  const chunker = new DocumentChunker({ parsing, chunking: config.chunking });

  return { config: { ...config, parsing }, result: chunker.process(text) };
}
