/**
 * @outline-chunks/types
 * outline-chunksの共通型定義
 */

// Section
export type { HeaderToken, HierarchyInfo, SectionRecord, RecordFlag } from './section.js';

// Chunk
export type { Chunk, ChunkRecord, ChunkSet } from './chunk.js';

// Result
export type { ExtractionResult, ExtractionStatus, PipelineResult } from './result.js';

// Errors
export {
  OutlineChunksError,
  InvalidTokenError,
  MalformedRecordBoundaryError,
  ConfigValidationError,
  type OutlineChunksErrorCode,
} from './errors.js';
export { isErrnoException, isNotFoundError } from './fs-errors.js';

// Config
export type {
  OutlineChunksConfig,
  ProjectConfig,
  FilesConfig,
  MatcherMode,
  ParsingConfig,
  ChunkingConfig,
  OutputFormat,
  OutputConfig,
  AnnotationConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  CONFIG_ENV_VAR,
  validateConfig,
  safeValidateConfig,
  configSchema,
  type ResolveConfigOptions,
  type ResolvedConfig,
  type PartialConfig,
  type ConfigValidationResult,
} from './config/index.js';

// Storage
export type { ChunkStorage } from './storage.js';
