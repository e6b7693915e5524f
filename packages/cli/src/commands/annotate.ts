/**
 * annotate コマンド
 * チャンクレコードの空のroleをロールカタログで埋める
 */

import * as path from 'path';
import type { ChunkRecord } from '@outline-chunks/types';
import { KeywordRoleAnnotator, annotateChunks } from '@outline-chunks/core';
import {
  parseChunkRecords,
  parseChunksJson,
  serializeChunkRecords,
  serializeChunksJson,
} from '@outline-chunks/storage';
import { readInputFile, resolveCommandConfig, writeOutput, type CommonCommandOptions } from '../utils/context.js';
import { exitWithError } from '../utils/errors.js';

export interface AnnotateCommandOptions extends CommonCommandOptions {
  /** ロールカタログ（JSON）のパス。未指定なら設定のannotation.rolesPath */
  roles?: string;
  output?: string;
}

export interface AnnotateResult {
  output: string;
  annotated: number;
  total: number;
}

function isJsonFile(file: string): boolean {
  return path.extname(file).toLowerCase() === '.json';
}

function countChanged(before: readonly ChunkRecord[], after: readonly ChunkRecord[]): number {
  return after.filter((record, i) => record.role !== before[i]?.role).length;
}

/**
 * レコードファイルを読み込み、roleを埋めて同じ形式で返す
 * 拡張子が .json ならJSON配列、それ以外はレコードテキスト形式として扱う
 */
export async function runAnnotate(recordsFile: string, options: AnnotateCommandOptions): Promise<AnnotateResult> {
  const cwd = options.cwd ?? process.cwd();
  const { config, projectRoot } = await resolveCommandConfig(options);

  const rolesPath = options.roles
    ? path.resolve(cwd, options.roles)
    : config.annotation.rolesPath
      ? path.resolve(projectRoot, config.annotation.rolesPath)
      : null;
  if (!rolesPath) {
    throw new Error('Role catalog not specified. Use --roles or set annotation.rolesPath.');
  }

  const json = isJsonFile(recordsFile);
  const text = await readInputFile(recordsFile, cwd);
  const parsed = json ? parseChunksJson(text) : parseChunkRecords(text);
  if (!parsed.ok) {
    throw parsed.error;
  }

  const annotator = await KeywordRoleAnnotator.fromFile(rolesPath);
  const records = await annotateChunks(parsed.records, annotator);

  return {
    output: json ? serializeChunksJson(records) : serializeChunkRecords(records),
    annotated: countChanged(parsed.records, records),
    total: records.length,
  };
}

/**
 * annotate コマンドを実行
 */
export async function executeAnnotate(recordsFile: string, options: AnnotateCommandOptions): Promise<void> {
  try {
    const result = await runAnnotate(recordsFile, options);
    await writeOutput(result.output, options.output, options.cwd);
    console.error(`✓ ${result.annotated}/${result.total} 件のチャンクにroleを付与しました`);
  } catch (error) {
    exitWithError(error);
  }
}
