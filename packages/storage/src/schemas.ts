import { z } from 'zod';

/**
 * シリアライズ境界でのチャンクレコード（キーはsnake_case）
 */
export const wireChunkRecordSchema = z
  .object({
    id: z.string().min(1),
    role: z.string().nullable(),
    header: z.string(),
    title: z.string(),
    text: z.string(),
    preceding_header_ids: z.array(z.string()),
    preceding_chunk_ids: z.array(z.string()).optional(),
  })
  .strict();

export type WireChunkRecord = z.infer<typeof wireChunkRecordSchema>;

const recordFlagSchema = z.enum(['invalid-token', 'lineage-mismatch']);

export const storedChunkSchema = z.object({
  id: z.string().min(1),
  role: z.string().nullable(),
  header: z.string(),
  title: z.string(),
  text: z.string(),
  precedingHeaderIds: z.array(z.string()),
  precedingChunkIds: z.array(z.string()).optional(),
  number: z.string(),
  level: z.number().int().nonnegative(),
  ancestry: z.array(z.string()),
  tokenCount: z.number().int().nonnegative(),
  startLine: z.number().int().positive(),
  endLine: z.number().int().positive(),
  flags: z.array(recordFlagSchema),
});

/**
 * 保存されたチャンク集合（createdAtはISO文字列からDateに戻す）
 */
export const storedChunkSetSchema = z.object({
  sourcePath: z.string(),
  sourceHash: z.string(),
  createdAt: z.coerce.date(),
  chunks: z.array(storedChunkSchema),
});
