/**
 * batch コマンド
 * 設定のパターンに合うファイルをまとめてチャンク化し、ストレージに保存する
 */

import * as path from 'path';
import type { ChunkSet } from '@outline-chunks/types';
import { DocumentChunker, FileDiscovery } from '@outline-chunks/core';
import { FileStorage, calculateSourceHash } from '@outline-chunks/storage';
import { readInputFile, resolveCommandConfig, type CommonCommandOptions } from '../utils/context.js';
import { exitWithError } from '../utils/errors.js';

export interface BatchCommandOptions extends CommonCommandOptions {
  /** 処理するファイル（プロジェクトルートからの相対パス）。未指定なら全ファイル */
  paths?: string[];
  /** 内容が変わっていないファイルも再処理する */
  force?: boolean;
}

export interface BatchSummary {
  /** チャンクを保存したファイル */
  processed: string[];
  /** 内容が変わっていないためスキップしたファイル */
  skipped: string[];
  /** 見出しが見つからなかったファイル */
  noHeaders: string[];
  chunksCreated: number;
  /** チャンク集合の保存先 */
  storagePath: string;
}

/**
 * ファイルを順に処理してチャンク集合を保存
 */
export async function runBatch(options: BatchCommandOptions): Promise<BatchSummary> {
  const { config, projectRoot } = await resolveCommandConfig(options);

  const discovery = new FileDiscovery({ rootDir: projectRoot, config: config.files });
  const files =
    options.paths && options.paths.length > 0
      ? await discovery.filter(options.paths)
      : await discovery.findFiles();

  const storagePath = path.resolve(projectRoot, config.output.chunksPath);
  const storage = new FileStorage({ basePath: storagePath });
  const chunker = new DocumentChunker(config);

  const summary: BatchSummary = {
    processed: [],
    skipped: [],
    noHeaders: [],
    chunksCreated: 0,
    storagePath,
  };

  for (const file of files) {
    const text = await readInputFile(file, projectRoot);
    const sourceHash = calculateSourceHash(text);

    if (!options.force) {
      const existing = await storage.get(file);
      if (existing?.sourceHash === sourceHash) {
        summary.skipped.push(file);
        continue;
      }
    }

    const result = chunker.process(text);
    if (result.status === 'no-headers') {
      summary.noHeaders.push(file);
    }

    const chunkSet: ChunkSet = {
      sourcePath: file,
      sourceHash,
      createdAt: new Date(),
      chunks: result.chunks,
    };
    await storage.save(file, chunkSet);

    summary.processed.push(file);
    summary.chunksCreated += result.chunks.length;
  }

  return summary;
}

/**
 * batch コマンドを実行
 */
export async function executeBatch(options: BatchCommandOptions): Promise<void> {
  try {
    console.log('Chunking documents...');
    if (options.force) {
      console.log('Mode: Force (ignore hash check)');
    } else {
      console.log('Mode: Smart (skip unchanged files)');
    }

    const summary = await runBatch(options);

    for (const file of summary.noHeaders) {
      console.warn(`⚠️  見出しが見つかりませんでした: ${file}`);
    }

    console.log('✓ Batch completed');
    console.log(`  Files processed: ${summary.processed.length}`);
    console.log(`  Files skipped (unchanged): ${summary.skipped.length}`);
    console.log(`  Chunks created: ${summary.chunksCreated}`);
    console.log(`  Storage: ${summary.storagePath}`);
  } catch (error) {
    exitWithError(error);
  }
}
