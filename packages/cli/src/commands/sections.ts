/**
 * sections コマンド
 * 見出しごとのセクションと階層情報を出力する
 */

import { serializeSectionsCsv } from '@outline-chunks/storage';
import { formatSectionsAsText } from '../utils/output.js';
import { writeOutput } from '../utils/context.js';
import { exitWithError } from '../utils/errors.js';
import { processFile, type ProcessFileOptions } from './process.js';

export type SectionsFormat = 'text' | 'json' | 'csv';

export interface SectionsCommandOptions extends ProcessFileOptions {
  format?: SectionsFormat;
  output?: string;
}

/**
 * セクションを抽出して出力文字列を返す
 */
export async function runSections(file: string, options: SectionsCommandOptions): Promise<string> {
  const { result } = await processFile(file, options);

  switch (options.format ?? 'text') {
    case 'json':
      return `${JSON.stringify(result.sections, null, 2)}\n`;
    case 'csv':
      return serializeSectionsCsv(result.sections);
    case 'text':
      return formatSectionsAsText(result.sections);
    default:
      throw new Error(`Unknown format: ${String(options.format)} (text, json, csv)`);
  }
}

/**
 * sections コマンドを実行
 */
export async function executeSections(file: string, options: SectionsCommandOptions): Promise<void> {
  try {
    const output = await runSections(file, options);
    await writeOutput(output, options.output, options.cwd);
  } catch (error) {
    exitWithError(error);
  }
}
