import { createHash } from 'node:crypto';

/**
 * ソーステキストのハッシュを計算（sha256, hex）
 */
export function calculateSourceHash(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}
