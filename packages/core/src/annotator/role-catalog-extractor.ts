import type { RoleDefinition } from './keyword-role-annotator.js';

/**
 * "Unit Training Manager (UTM)" 形式のロール定義
 *
 * 名前は大文字で始まる単語の並び（間に of / and / for を挟んでもよい）で、
 * 行をまたがない。略称は英字で始まる2文字以上で、空白を含まない。
 */
const ROLE_DEFINITION_PATTERN =
  /\b(?<name>[A-Z][\w.'-]*(?:[ \t]+(?:(?:of|and|for)[ \t]+)*[A-Z][\w.'-]*)*)[ \t]*\((?<abbreviation>[A-Za-z][A-Za-z0-9/-]+)\)/g;

/**
 * 文書テキストからロールカタログを抽出
 *
 * 同じ名前（大文字小文字を区別しない）は最初の出現だけを残し、略称は大文字に揃える。
 * 結果は KeywordRoleAnnotator にそのまま渡せる。
 */
export function extractRoleCatalog(text: string): RoleDefinition[] {
  const roles = new Map<string, RoleDefinition>();

  for (const match of text.matchAll(ROLE_DEFINITION_PATTERN)) {
    const name = (match.groups?.name ?? '').split(/[ \t]+/).join(' ');
    const abbreviation = (match.groups?.abbreviation ?? '').toUpperCase();
    const key = name.toLowerCase();

    if (name && abbreviation && !roles.has(key)) {
      roles.set(key, { name, abbreviation });
    }
  }

  return [...roles.values()];
}
