/**
 * ChunkStorageインターフェイス
 */

import type { ChunkSet } from './chunk.js';

export interface ChunkStorage {
  /**
   * チャンク集合を保存
   */
  save(sourcePath: string, chunkSet: ChunkSet): Promise<void>;

  /**
   * チャンク集合を取得
   */
  get(sourcePath: string): Promise<ChunkSet | null>;

  /**
   * チャンク集合を削除
   */
  delete(sourcePath: string): Promise<void>;

  /**
   * 保存済みのソースパスを取得
   */
  list(): Promise<string[]>;

  exists(sourcePath: string): Promise<boolean>;
}
