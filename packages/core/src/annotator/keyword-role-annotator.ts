import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { ChunkRecord } from '@outline-chunks/types';
import type { RoleAnnotator } from './role-annotator.js';

export const roleDefinitionSchema = z.object({
  /** ロール名（例: "Unit Training Manager"） */
  name: z.string().min(1),
  /** 略称（例: "UTM"） */
  abbreviation: z.string().min(1).optional(),
});

export const roleCatalogSchema = z.array(roleDefinitionSchema);

export type RoleDefinition = z.infer<typeof roleDefinitionSchema>;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

interface CompiledRole {
  name: string;
  lowerName: string;
  abbreviation: RegExp | null;
}

/**
 * ロールカタログとのキーワード一致でroleを決めるアノテータ
 *
 * タイトル → 本文の順に探し、カタログ順で最初に一致したロールを返す。
 * 名前は大文字小文字を区別せず部分一致、略称は区別して単語単位で一致させる。
 */
export class KeywordRoleAnnotator implements RoleAnnotator {
  private readonly roles: CompiledRole[];

  constructor(roles: readonly RoleDefinition[]) {
    this.roles = roles.map((role) => ({
      name: role.name,
      lowerName: role.name.toLowerCase(),
      abbreviation: role.abbreviation
        ? new RegExp(`\\b${escapeRegExp(role.abbreviation)}\\b`)
        : null,
    }));
  }

  /**
   * JSONファイルからロールカタログを読み込む
   */
  static async fromFile(catalogPath: string): Promise<KeywordRoleAnnotator> {
    const content = await readFile(catalogPath, 'utf-8');
    const parsed = roleCatalogSchema.safeParse(JSON.parse(content));

    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const location = issue ? issue.path.join('.') : '';
      throw new Error(
        `Invalid role catalog ${catalogPath}: ${location ? `${location}: ` : ''}${issue?.message ?? 'unknown error'}`
      );
    }

    return new KeywordRoleAnnotator(parsed.data);
  }

  async annotate(chunk: ChunkRecord): Promise<string | null> {
    return this.match(chunk.title) ?? this.match(chunk.text);
  }

  private match(text: string): string | null {
    if (!text) {
      return null;
    }

    const lower = text.toLowerCase();
    const role = this.roles.find(
      (candidate) =>
        lower.includes(candidate.lowerName) ||
        (candidate.abbreviation !== null && candidate.abbreviation.test(text))
    );

    return role ? role.name : null;
  }
}
