/**
 * FileStorageのテスト
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { Chunk, ChunkSet } from '@outline-chunks/types';
import { FileStorage } from '../file-storage.js';
import { calculateSourceHash } from '../hash.js';

function createChunk(overrides: Partial<Chunk> = {}): Chunk {
  return {
    id: 'chunk_001',
    role: null,
    header: '1.',
    title: 'Scope',
    text: 'Applies to all units.',
    precedingHeaderIds: [],
    precedingChunkIds: [],
    number: '1',
    level: 1,
    ancestry: [],
    tokenCount: 5,
    startLine: 1,
    endLine: 2,
    flags: [],
    ...overrides,
  };
}

function createChunkSet(sourcePath: string, source = '1. Scope\nApplies to all units.'): ChunkSet {
  return {
    sourcePath,
    sourceHash: calculateSourceHash(source),
    createdAt: new Date('2024-05-01T12:00:00.000Z'),
    chunks: [
      createChunk(),
      createChunk({
        id: 'chunk_002',
        header: '1.1',
        title: 'Detail',
        text: '',
        precedingHeaderIds: ['1.'],
        precedingChunkIds: ['chunk_001'],
        number: '1.1',
        level: 2,
        ancestry: ['1'],
        tokenCount: 0,
        startLine: 3,
        endLine: 3,
        flags: ['lineage-mismatch'],
      }),
    ],
  };
}

describe('FileStorage', () => {
  let storage: FileStorage;
  let testDir: string;

  beforeEach(async () => {
    // テスト用の一時ディレクトリを作成
    testDir = join(tmpdir(), `outline-chunks-storage-test-${process.pid}-${Date.now()}`);
    await fs.mkdir(testDir, { recursive: true });
    storage = new FileStorage({ basePath: testDir });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('save / get', () => {
    it('保存したチャンク集合をそのまま取得できる', async () => {
      const chunkSet = createChunkSet('manuals/policy.txt');

      await storage.save(chunkSet.sourcePath, chunkSet);
      const retrieved = await storage.get(chunkSet.sourcePath);

      expect(retrieved).toEqual(chunkSet);
    });

    it('createdAtはDate型で返る', async () => {
      const chunkSet = createChunkSet('policy.txt');

      await storage.save(chunkSet.sourcePath, chunkSet);
      const retrieved = await storage.get(chunkSet.sourcePath);

      expect(retrieved?.createdAt).toBeInstanceOf(Date);
      expect(retrieved?.createdAt.toISOString()).toBe('2024-05-01T12:00:00.000Z');
    });

    it('存在しないチャンク集合はnullを返す', async () => {
      expect(await storage.get('non-existent.txt')).toBeNull();
    });

    it('壊れたファイルはエラー', async () => {
      await fs.writeFile(join(testDir, 'broken.txt.json'), JSON.stringify({ sourcePath: 'broken.txt' }));

      await expect(storage.get('broken.txt')).rejects.toThrow('Corrupted chunk file');
    });
  });

  describe('delete', () => {
    it('チャンク集合を削除できる', async () => {
      const chunkSet = createChunkSet('policy.txt');

      await storage.save(chunkSet.sourcePath, chunkSet);
      await storage.delete(chunkSet.sourcePath);

      expect(await storage.exists(chunkSet.sourcePath)).toBe(false);
    });

    it('存在しないチャンク集合の削除でエラーにならない', async () => {
      await expect(storage.delete('non-existent.txt')).resolves.toBeUndefined();
    });
  });

  describe('list', () => {
    it('保存済みのソースパスをソートして返す', async () => {
      for (const sourcePath of ['policy.txt', 'b/annex.txt', 'a/sub/manual.txt']) {
        await storage.save(sourcePath, createChunkSet(sourcePath));
      }

      expect(await storage.list()).toEqual(['a/sub/manual.txt', 'b/annex.txt', 'policy.txt']);
    });

    it('保存がない場合は空配列を返す', async () => {
      expect(await storage.list()).toEqual([]);
    });

    it('ベースディレクトリがなくても空配列を返す', async () => {
      const missing = new FileStorage({ basePath: join(testDir, 'missing') });
      expect(await missing.list()).toEqual([]);
    });
  });

  describe('パス正規化', () => {
    it('バックスラッシュをスラッシュに変換する', async () => {
      const chunkSet = createChunkSet('manuals\\policy.txt');

      await storage.save(chunkSet.sourcePath, chunkSet);

      expect(await storage.get('manuals/policy.txt')).not.toBeNull();
    });
  });

  describe('calculateSourceHash', () => {
    it('内容が同じなら同じハッシュ', () => {
      expect(calculateSourceHash('1. A')).toBe(calculateSourceHash('1. A'));
      expect(calculateSourceHash('1. A')).toMatch(/^[0-9a-f]{64}$/);
    });

    it('内容が異なれば異なるハッシュ', () => {
      expect(calculateSourceHash('1. A')).not.toBe(calculateSourceHash('1. B'));
    });
  });
});
