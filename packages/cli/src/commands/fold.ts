/**
 * fold コマンド
 * 抽出テキストの物理行を、見出し単位の論理行に折り畳む
 */

import { foldLines, normalizeText } from '@outline-chunks/core';
import { readInputFile, resolveCommandConfig, writeOutput, type CommonCommandOptions } from '../utils/context.js';
import { exitWithError } from '../utils/errors.js';

export interface FoldCommandOptions extends CommonCommandOptions {
  output?: string;
}

export async function runFold(file: string, options: FoldCommandOptions): Promise<string> {
  const { config } = await resolveCommandConfig(options);
  const text = await readInputFile(file, options.cwd);
  const folded = foldLines(normalizeText(text, config.parsing.pageBreakPattern));
  return folded ? `${folded}\n` : '';
}

export async function executeFold(file: string, options: FoldCommandOptions): Promise<void> {
  try {
    const output = await runFold(file, options);
    await writeOutput(output, options.output, options.cwd);
  } catch (error) {
    exitWithError(error);
  }
}
