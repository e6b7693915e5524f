import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { parseChunkRecords } from '@outline-chunks/storage';
import { runSections } from '../sections.js';
import { runChunks } from '../chunks.js';
import { runFold } from '../fold.js';
import { runAnnotate } from '../annotate.js';
import { runRoles } from '../roles.js';

const POLICY = [
  'UNIT TRAINING POLICY',
  '1. Scope',
  'Applies to all units.',
  '--- PAGE 2 ---',
  '1.1 Unit Commander (CC).',
  'Appoints the "UTM" in writing.',
  '2. Records',
  'Keep them.',
  '',
].join('\n');

describe('commands', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = path.join(tmpdir(), `outline-chunks-cli-test-${process.pid}-${Date.now()}`);
    await fs.mkdir(testDir, { recursive: true });
    await fs.writeFile(path.join(testDir, '.outline-chunks.json'), JSON.stringify({ project: { name: 'test' } }));
    await fs.writeFile(path.join(testDir, 'policy.txt'), POLICY);
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('sections', () => {
    it('CSVでセクションと階層情報を出力する', async () => {
      const csv = await runSections('policy.txt', { cwd: testDir, format: 'csv' });

      expect(csv.split('\n')).toEqual([
        '"section_number","level","parent_number","ancestry","section_title","content"',
        '"1","1","","[]","Scope","Applies to all units."',
        '"1.1","2","1","[""1""]","Unit Commander (CC).","Appoints the ""UTM"" in writing."',
        '"2","1","","[]","Records","Keep them."',
        '',
      ]);
    });

    it('--preambleで最初の見出しより前のテキストも出力する', async () => {
      const json = await runSections('policy.txt', { cwd: testDir, format: 'json', preamble: true });
      const sections: unknown = JSON.parse(json);

      expect(sections).toMatchObject([
        { kind: 'preamble', content: 'UNIT TRAINING POLICY', startLine: 1, endLine: 1 },
        { kind: 'section', number: '1' },
        { kind: 'section', number: '1.1' },
        { kind: 'section', number: '2' },
      ]);
    });
  });

  describe('chunks', () => {
    it('レコード形式で祖先の見出しを出力する', async () => {
      const output = await runChunks('policy.txt', { cwd: testDir, format: 'records' });
      const parsed = parseChunkRecords(output);

      expect(parsed.ok).toBe(true);
      if (parsed.ok) {
        expect(
          parsed.records.map((r) => [r.id, r.header, r.precedingHeaderIds, r.precedingChunkIds])
        ).toEqual([
          ['chunk_001', '1.', [], []],
          ['chunk_002', '1.1', ['1.'], ['chunk_001']],
          ['chunk_003', '2.', [], []],
        ]);
      }
    });

    it('テキスト形式では件数と系譜を表示する', async () => {
      const output = await runChunks('policy.txt', { cwd: testDir });
      const lines = output.split('\n');

      expect(lines[0]).toBe('チャンク: 3件');
      expect(lines).toContain('[chunk_002] 1.1 Unit Commander (CC).');
    });

    it('見出しがなければ0件', async () => {
      await fs.writeFile(path.join(testDir, 'plain.txt'), 'No numbering here.\n');

      expect(await runChunks('plain.txt', { cwd: testDir, format: 'records' })).toBe('');
      expect(await runChunks('plain.txt', { cwd: testDir, format: 'json' })).toBe('[]\n');
    });

    it('存在しないファイルはENOENT', async () => {
      await expect(runChunks('missing.txt', { cwd: testDir })).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  describe('fold', () => {
    it('見出しブロックを1行に折り畳む', async () => {
      await fs.writeFile(
        path.join(testDir, 'wrapped.txt'),
        'Cover\n1.1 Scope of\nthe policy\n--- PAGE 2 ---\n1.2 Roles\nand duties\n'
      );

      const output = await runFold('wrapped.txt', { cwd: testDir });

      expect(output).toBe('Cover\n1.1 Scope of the policy\n1.2 Roles and duties\n');
    });
  });

  describe('annotate', () => {
    it('ロールカタログでroleを埋める', async () => {
      await fs.writeFile(
        path.join(testDir, 'roles.json'),
        JSON.stringify([
          { name: 'Unit Commander', abbreviation: 'CC' },
          { name: 'Unit Training Manager', abbreviation: 'UTM' },
        ])
      );
      await fs.writeFile(
        path.join(testDir, 'chunks.txt'),
        await runChunks('policy.txt', { cwd: testDir, format: 'records' })
      );

      const result = await runAnnotate('chunks.txt', { cwd: testDir, roles: 'roles.json' });
      const parsed = parseChunkRecords(result.output);

      expect(result.total).toBe(3);
      expect(result.annotated).toBe(1);
      expect(parsed.ok && parsed.records.map((r) => r.role)).toEqual([null, 'Unit Commander', null]);
    });

    it('ロールカタログが未指定ならエラー', async () => {
      await fs.writeFile(path.join(testDir, 'chunks.txt'), '');

      await expect(runAnnotate('chunks.txt', { cwd: testDir })).rejects.toThrow('Role catalog not specified');
    });

    it('壊れたレコードファイルはMalformedRecordBoundaryError', async () => {
      await fs.writeFile(path.join(testDir, 'roles.json'), '[]');
      await fs.writeFile(path.join(testDir, 'chunks.txt'), '{ not json');

      await expect(
        runAnnotate('chunks.txt', { cwd: testDir, roles: 'roles.json' })
      ).rejects.toMatchObject({ code: 'MALFORMED_RECORD_BOUNDARY' });
    });
  });

  describe('roles', () => {
    it('文書全体から "名前 (略称)" のロールカタログを作る', async () => {
      const roles: unknown = JSON.parse(await runRoles('policy.txt', { cwd: testDir }));

      expect(roles).toEqual([{ name: 'Unit Commander', abbreviation: 'CC' }]);
    });

    it('--sectionで指定セクションとその子孫に範囲を絞る', async () => {
      expect(JSON.parse(await runRoles('policy.txt', { cwd: testDir, section: '1.' }))).toEqual([
        { name: 'Unit Commander', abbreviation: 'CC' },
      ]);
      expect(await runRoles('policy.txt', { cwd: testDir, section: '2' })).toBe('[]\n');
    });

    it('存在しないセクションを指定するとエラー', async () => {
      await expect(runRoles('policy.txt', { cwd: testDir, section: '9' })).rejects.toThrow(
        'Section "9" not found in policy.txt'
      );
    });

    it('作ったカタログをannotateにそのまま渡せる', async () => {
      await fs.writeFile(path.join(testDir, 'roles.json'), await runRoles('policy.txt', { cwd: testDir }));
      await fs.writeFile(
        path.join(testDir, 'chunks.txt'),
        await runChunks('policy.txt', { cwd: testDir, format: 'records' })
      );

      const result = await runAnnotate('chunks.txt', { cwd: testDir, roles: 'roles.json' });

      expect(result.annotated).toBe(1);
    });
  });
});
