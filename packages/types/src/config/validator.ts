import { z } from 'zod';
import { ConfigValidationError } from '../errors.js';

/**
 * 正規表現としてコンパイルできるか
 */
function isValidPattern(source: string): boolean {
  try {
    new RegExp(source, 'gm');
    return true;
  } catch {
    return false;
  }
}

const projectSchema = z
  .object({
    name: z.string(),
    root: z.string(),
  })
  .partial();

const filesSchema = z
  .object({
    include: z.array(z.string()),
    exclude: z.array(z.string()),
    ignoreGitignore: z.boolean(),
  })
  .partial();

const parsingSchema = z
  .object({
    matcherMode: z.enum(['strict', 'loose']),
    preamble: z.enum(['discard', 'record']),
    pageBreakPattern: z.string().min(1).refine(isValidPattern, {
      message: 'must be a valid regular expression',
    }),
    foldLines: z.boolean(),
    noHeadersFallback: z.enum(['empty', 'single-chunk']),
  })
  .partial();

const chunkingSchema = z
  .object({
    idPrefix: z.string(),
    idPadding: z.number().int().min(1).max(10),
    trackPrecedingChunkIds: z.boolean(),
    maxTokensPerChunk: z.number().int().positive(),
  })
  .partial();

const outputSchema = z
  .object({
    format: z.enum(['records', 'json']),
    chunksPath: z.string().min(1),
  })
  .partial();

const annotationSchema = z
  .object({
    rolesPath: z.string().nullable(),
  })
  .partial();

export const configSchema = z
  .object({
    version: z.string(),
    project: projectSchema,
    files: filesSchema,
    parsing: parsingSchema,
    chunking: chunkingSchema,
    output: outputSchema,
    annotation: annotationSchema,
  })
  .partial();

/** バリデーション済みの部分設定（デフォルトとのマージ前） */
export type PartialConfig = z.infer<typeof configSchema>;

export type ConfigValidationResult =
  | { success: true; config: PartialConfig }
  | { success: false; error: ConfigValidationError };

/**
 * 設定オブジェクトをバリデーション（例外を投げない版）
 */
export function safeValidateConfig(config: unknown): ConfigValidationResult {
  const parsed = configSchema.safeParse(config);
  if (parsed.success) {
    return { success: true, config: parsed.data };
  }

  const issue = parsed.error.issues[0];
  if (!issue || issue.path.length === 0) {
    return {
      success: false,
      error: new ConfigValidationError('Config must be an object', 'config'),
    };
  }

  const path = ['config', ...issue.path.map(String)].join('.');
  return {
    success: false,
    error: new ConfigValidationError(`${path}: ${issue.message}`, path),
  };
}

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): PartialConfig {
  const result = safeValidateConfig(config);
  if (!result.success) {
    throw result.error;
  }
  return result.config;
}
