/**
 * 抽出結果の型定義
 *
 * 見出しが見つからないケースは例外ではなく、表現可能な結果として返す
 */

import type { SectionRecord } from './section.js';
import type { Chunk } from './chunk.js';

export type ExtractionStatus = 'ok' | 'no-headers';

export type ExtractionResult =
  | { status: 'ok'; sections: SectionRecord[] }
  | { status: 'no-headers'; sections: [] };

export interface PipelineResult {
  status: ExtractionStatus;
  sections: SectionRecord[];
  chunks: Chunk[];
}
