export { serializeChunkRecords, parseChunkRecords, RECORD_SEPARATOR } from './record-format.js';
export { serializeChunksJson, parseChunksJson } from './json-format.js';
export { serializeSectionsCsv, SECTION_CSV_COLUMNS } from './sections-csv.js';
export { toWireRecord, fromWireRecord } from './wire.js';
export type { ParseChunkRecordsResult } from './result.js';
