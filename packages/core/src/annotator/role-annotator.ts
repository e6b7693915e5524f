import type { ChunkRecord } from '@outline-chunks/types';

/**
 * チャンクに分類ラベル（role）を付与する外部機能
 * 生成モデルなどの実装はこのインターフェイスの外側に置く
 */
export interface RoleAnnotator {
  /**
   * チャンクのroleを判定
   * @returns 判定できなければnull
   */
  annotate(chunk: ChunkRecord): Promise<string | null>;
}

/**
 * roleが既に埋まっているか
 */
export function hasRole(chunk: ChunkRecord): boolean {
  return chunk.role !== null && chunk.role.trim() !== '';
}

/**
 * roleが空のチャンクだけをアノテートする
 * 文書順に1件ずつ処理し、元のチャンクは変更せず新しい配列を返す
 */
export async function annotateChunks<T extends ChunkRecord>(
  chunks: readonly T[],
  annotator: RoleAnnotator
): Promise<T[]> {
  const annotated: T[] = [];

  for (const chunk of chunks) {
    if (hasRole(chunk)) {
      annotated.push(chunk);
      continue;
    }

    const role = await annotator.annotate(chunk);
    annotated.push({ ...chunk, role });
  }

  return annotated;
}
