import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { FileDiscovery } from '../file-discovery.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';

const TEST_DIR = path.join(tmpdir(), `outline-chunks-discovery-test-${process.pid}`);

describe('FileDiscovery', () => {
  beforeAll(async () => {
    // テスト用ディレクトリとファイルを作成
    await fs.mkdir(path.join(TEST_DIR, 'extracted'), { recursive: true });
    await fs.mkdir(path.join(TEST_DIR, 'node_modules'), { recursive: true });
    await fs.mkdir(path.join(TEST_DIR, 'scratch'), { recursive: true });

    await fs.writeFile(path.join(TEST_DIR, 'policy.txt'), '1. Purpose');
    await fs.writeFile(path.join(TEST_DIR, 'extracted', 'manual.txt'), '1. Scope');
    await fs.writeFile(path.join(TEST_DIR, 'extracted', 'notes.md'), '# Notes');
    await fs.writeFile(path.join(TEST_DIR, 'node_modules', 'lib.txt'), 'lib');
    await fs.writeFile(path.join(TEST_DIR, 'scratch', 'draft.txt'), 'draft');

    await fs.writeFile(path.join(TEST_DIR, '.gitignore'), 'scratch/\n');
  });

  afterAll(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('findFiles', () => {
    it('includeパターンでファイルを検索できる', async () => {
      const discovery = new FileDiscovery({
        rootDir: TEST_DIR,
        config: { include: ['**/*.txt'], exclude: [], ignoreGitignore: false },
      });

      const files = await discovery.findFiles();
      expect(files).toContain('policy.txt');
      expect(files).toContain('extracted/manual.txt');
      expect(files).not.toContain('extracted/notes.md');
    });

    it('excludeパターンでファイルを除外できる', async () => {
      const discovery = new FileDiscovery({
        rootDir: TEST_DIR,
        config: { include: ['**/*.txt'], exclude: ['**/node_modules/**'], ignoreGitignore: false },
      });

      const files = await discovery.findFiles();
      expect(files).not.toContain('node_modules/lib.txt');
      expect(files).toContain('scratch/draft.txt');
    });

    it('.gitignoreを尊重できる', async () => {
      const discovery = new FileDiscovery({
        rootDir: TEST_DIR,
        config: { include: ['**/*.txt'], exclude: ['**/node_modules/**'], ignoreGitignore: true },
      });

      const files = await discovery.findFiles();
      expect(files).toEqual(['extracted/manual.txt', 'policy.txt']);
    });

    it('存在しないディレクトリでも動作する', async () => {
      const discovery = new FileDiscovery({
        rootDir: path.join(TEST_DIR, 'nonexistent'),
        config: { include: ['**/*.txt'], exclude: [], ignoreGitignore: true },
      });

      expect(await discovery.findFiles()).toEqual([]);
    });
  });

  describe('matchesPattern', () => {
    it('ルートレベルとネストしたファイルの両方にマッチする', () => {
      const discovery = new FileDiscovery({
        rootDir: TEST_DIR,
        config: { include: ['**/*.txt'], exclude: ['**/node_modules/**'], ignoreGitignore: false },
      });

      expect(discovery.matchesPattern('policy.txt')).toBe(true);
      expect(discovery.matchesPattern('extracted/manual.txt')).toBe(true);
      expect(discovery.matchesPattern('extracted/notes.md')).toBe(false);
      expect(discovery.matchesPattern('node_modules/lib.txt')).toBe(false);
    });
  });

  describe('filter', () => {
    it('パターンと.gitignoreで指定パスを絞り込む', async () => {
      const discovery = new FileDiscovery({
        rootDir: TEST_DIR,
        config: { include: ['**/*.txt'], exclude: [], ignoreGitignore: true },
      });

      const files = await discovery.filter([
        'policy.txt',
        'scratch/draft.txt',
        'extracted/notes.md',
      ]);
      expect(files).toEqual(['policy.txt']);
    });
  });
});
