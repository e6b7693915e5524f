/**
 * roles コマンド
 * 文書中の "名前 (略称)" からロールカタログ（JSON）を作る
 */

import { canonicalizeToken, extractRoleCatalog, normalizeText } from '@outline-chunks/core';
import { readInputFile, resolveCommandConfig, writeOutput } from '../utils/context.js';
import { exitWithError } from '../utils/errors.js';
import { processFile, type ProcessFileOptions } from './process.js';

export interface RolesCommandOptions extends ProcessFileOptions {
  /** この番号のセクションとその子孫だけから抽出する（例: "2"） */
  section?: string;
  output?: string;
}

/**
 * 対象範囲のテキストを取り出す
 */
async function collectSourceText(file: string, options: RolesCommandOptions): Promise<string> {
  if (!options.section) {
    const { config } = await resolveCommandConfig(options);
    return normalizeText(await readInputFile(file, options.cwd), config.parsing.pageBreakPattern);
  }

  const target = canonicalizeToken(options.section);
  const { result } = await processFile(file, options);
  const sections = result.sections.filter(
    (section) => section.number === target || section.ancestry.includes(target)
  );
  if (sections.length === 0) {
    throw new Error(`Section "${target}" not found in ${file}`);
  }

  return sections.map((section) => `${section.title}\n${section.content}`).join('\n');
}

/**
 * ロールカタログを抽出してJSON文字列を返す
 */
export async function runRoles(file: string, options: RolesCommandOptions): Promise<string> {
  const roles = extractRoleCatalog(await collectSourceText(file, options));
  return `${JSON.stringify(roles, null, 2)}\n`;
}

/**
 * roles コマンドを実行
 */
export async function executeRoles(file: string, options: RolesCommandOptions): Promise<void> {
  try {
    const output = await runRoles(file, options);
    await writeOutput(output, options.output, options.cwd);
  } catch (error) {
    exitWithError(error);
  }
}
