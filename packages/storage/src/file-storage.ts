/**
 * ファイルベースのChunkStorage実装
 */

import { promises as fs } from 'node:fs';
import { join, dirname, normalize } from 'node:path';
import { isNotFoundError, type ChunkSet, type ChunkStorage } from '@outline-chunks/types';
import { storedChunkSetSchema } from './schemas.js';
import { describeIssue } from './formats/wire.js';

export interface FileStorageOptions {
  /** ストレージのベースディレクトリ */
  basePath: string;
}

/**
 * ファイルベースのChunkStorage
 * ソースファイルごとにチャンク集合をJSON形式で保存
 */
export class FileStorage implements ChunkStorage {
  private basePath: string;

  constructor(options: FileStorageOptions) {
    this.basePath = normalize(options.basePath);
  }

  /**
   * チャンク集合を保存
   */
  async save(sourcePath: string, chunkSet: ChunkSet): Promise<void> {
    const filePath = this.getFilePath(this.normalizePath(sourcePath));

    // ディレクトリを作成
    await fs.mkdir(dirname(filePath), { recursive: true });

    await fs.writeFile(filePath, JSON.stringify(chunkSet, null, 2), 'utf-8');
  }

  /**
   * チャンク集合を取得
   */
  async get(sourcePath: string): Promise<ChunkSet | null> {
    const filePath = this.getFilePath(this.normalizePath(sourcePath));

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }

    // Date型への変換もスキーマで行う
    const parsed = storedChunkSetSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Corrupted chunk file ${filePath}: ${describeIssue(parsed.error.issues[0])}`);
    }

    return parsed.data;
  }

  /**
   * チャンク集合を削除
   */
  async delete(sourcePath: string): Promise<void> {
    const filePath = this.getFilePath(this.normalizePath(sourcePath));

    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (isNotFoundError(error)) {
        // 既に存在しない場合はエラーにしない
        return;
      }
      throw error;
    }
  }

  /**
   * 保存済みのソースパスを取得（ソート済み）
   */
  async list(): Promise<string[]> {
    const paths: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      try {
        const entries = await fs.readdir(dir, { withFileTypes: true });

        for (const entry of entries) {
          const fullPath = join(dir, entry.name);

          if (entry.isDirectory()) {
            await walk(fullPath);
          } else if (entry.isFile() && entry.name.endsWith('.json')) {
            // ベースパスからの相対パスを計算
            const relativePath = fullPath
              .slice(this.basePath.length + 1)
              .replace(/\.json$/, '')
              .replace(/\\/g, '/');
            paths.push(relativePath);
          }
        }
      } catch (error) {
        if (isNotFoundError(error)) {
          // ディレクトリが存在しない場合は空配列を返す
          return;
        }
        throw error;
      }
    };

    await walk(this.basePath);
    return paths.sort();
  }

  /**
   * チャンク集合の存在確認
   */
  async exists(sourcePath: string): Promise<boolean> {
    const filePath = this.getFilePath(this.normalizePath(sourcePath));

    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * パスを正規化
   */
  private normalizePath(path: string): string {
    return normalize(path).replace(/\\/g, '/');
  }

  /**
   * ファイルパスを取得
   */
  private getFilePath(normalizedPath: string): string {
    return join(this.basePath, `${normalizedPath}.json`);
  }
}
