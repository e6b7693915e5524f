/**
 * config init コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { ConfigLoader } from '@outline-chunks/types';
import { initConfig } from '../init.js';

describe('config init', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    // 各テストで独立したディレクトリを作成
    testDir = path.join(tmpdir(), `.test-config-init-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    configPath = path.join(testDir, '.outline-chunks.json');
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('設定ファイルを生成できる', async () => {
    await initConfig({ cwd: testDir });

    const content = await fs.readFile(configPath, 'utf-8');
    const config = JSON.parse(content);

    expect(config.version).toBe('1.0');
    expect(config.project.name).toMatch(/^\.test-config-init-/);
    expect(config.project.root).toBe('.');
    expect(config.parsing.matcherMode).toBe('strict');
  });

  it('プロジェクト名はプロジェクトルートのディレクトリ名', async () => {
    await initConfig({ cwd: testDir, projectRoot: '/custom/handbook' });

    const config = JSON.parse(await fs.readFile(configPath, 'utf-8'));

    expect(config.project.name).toBe('handbook');
    expect(config.project.root).toBe('.');
  });

  it('既存ファイルがある場合はエラーを投げる', async () => {
    await initConfig({ cwd: testDir });

    await expect(initConfig({ cwd: testDir })).rejects.toThrow('Configuration file already exists');
  });

  it('--forceオプションで既存ファイルを上書きできる', async () => {
    await fs.writeFile(configPath, JSON.stringify({ project: { name: 'old' } }));

    await initConfig({ cwd: testDir, force: true });

    const config = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    expect(config.project.name).not.toBe('old');
  });

  it('生成された設定ファイルをそのまま読み込める', async () => {
    await initConfig({ cwd: testDir });

    const loaded = await ConfigLoader.load(configPath);

    expect(loaded).toEqual({
      ...ConfigLoader.getDefaultConfig(),
      project: { name: path.basename(testDir), root: '.' },
    });
  });
});
