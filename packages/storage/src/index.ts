/**
 * @outline-chunks/storage
 * チャンクの保存とシリアライズ
 */

export { FileStorage, type FileStorageOptions } from './file-storage.js';
export { calculateSourceHash } from './hash.js';
export * from './formats/index.js';
export {
  wireChunkRecordSchema,
  storedChunkSetSchema,
  type WireChunkRecord,
} from './schemas.js';
