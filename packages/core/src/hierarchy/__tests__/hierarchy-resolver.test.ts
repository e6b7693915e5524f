import { describe, it, expect } from 'vitest';
import { InvalidTokenError } from '@outline-chunks/types';
import { resolveHierarchy } from '../hierarchy-resolver.js';

describe('resolveHierarchy', () => {
  it('レベル1のトークンには親も祖先もない', () => {
    expect(resolveHierarchy('2')).toEqual({ level: 1, parent: null, ancestry: [] });
  });

  it('多階層のトークンから親と祖先を導出する', () => {
    expect(resolveHierarchy('2.3.1')).toEqual({
      level: 3,
      parent: '2.3',
      ancestry: ['2', '2.3'],
    });
  });

  it('A接頭辞はそのまま祖先に引き継がれる', () => {
    expect(resolveHierarchy('A1.2')).toEqual({ level: 2, parent: 'A1', ancestry: ['A1'] });
  });

  it('どのトークンでもlevelはパート数、祖先はlevel-1個の厳密な接頭辞', () => {
    const tokens = ['1', '2.3', '2.3.1', 'A1.2', 'A1.1.1', '12.4.7.9', '3.1.2.3.5.1'];

    for (const token of tokens) {
      const info = resolveHierarchy(token);
      expect(info.level).toBe(token.split('.').length);
      expect(info.ancestry).toHaveLength(info.level - 1);
      for (const ancestor of info.ancestry) {
        expect(token.startsWith(`${ancestor}.`)).toBe(true);
      }
    }
  });

  it('空トークンはInvalidTokenError', () => {
    expect(() => resolveHierarchy('')).toThrow(InvalidTokenError);
  });

  it('空のパートを含むトークンはInvalidTokenError', () => {
    expect(() => resolveHierarchy('1..2')).toThrow(InvalidTokenError);
    expect(() => resolveHierarchy('1.')).toThrow('Invalid header token: "1."');
  });
});
