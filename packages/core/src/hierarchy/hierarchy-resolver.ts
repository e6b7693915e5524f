import { InvalidTokenError, type HierarchyInfo } from '@outline-chunks/types';

/** 番号パートの区切り文字 */
export const TOKEN_SEPARATOR = '.';

/**
 * 正規形トークンから階層情報を導出
 *
 * "2.3.1" → { level: 3, parent: "2.3", ancestry: ["2", "2.3"] }
 * "A1.2"  → { level: 2, parent: "A1",  ancestry: ["A1"] }
 *
 * @throws InvalidTokenError 空トークン、または空のパートを含む場合
 */
export function resolveHierarchy(token: string): HierarchyInfo {
  const parts = token.split(TOKEN_SEPARATOR);

  if (token.length === 0 || parts.some((part) => part.length === 0)) {
    throw new InvalidTokenError(token);
  }

  const level = parts.length;
  const ancestry: string[] = [];
  for (let i = 1; i < level; i++) {
    ancestry.push(parts.slice(0, i).join(TOKEN_SEPARATOR));
  }

  return {
    level,
    parent: level > 1 ? parts.slice(0, -1).join(TOKEN_SEPARATOR) : null,
    ancestry,
  };
}
