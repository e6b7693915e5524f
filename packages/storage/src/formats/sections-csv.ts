import type { SectionRecord } from '@outline-chunks/types';

export const SECTION_CSV_COLUMNS = [
  'section_number',
  'level',
  'parent_number',
  'ancestry',
  'section_title',
  'content',
] as const;

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * セクション列をCSVに変換
 * すべてのフィールドを引用符で囲み、ancestryはJSONのリストで書く
 */
export function serializeSectionsCsv(sections: readonly SectionRecord[]): string {
  const rows = sections.map((section) =>
    [
      section.number,
      String(section.level),
      section.parentNumber ?? '',
      JSON.stringify(section.ancestry),
      section.title,
      section.content,
    ]
      .map(quote)
      .join(',')
  );

  return `${[SECTION_CSV_COLUMNS.map(quote).join(','), ...rows].join('\n')}\n`;
}
