/**
 * @outline-chunks/core
 *
 * 番号付き見出しの解析とチャンク構築
 */

export {
  matchHeader,
  findHeaders,
  canonicalizeToken,
  TOKEN_PATTERNS,
  type HeaderMatch,
} from './matcher/header-matcher.js';
export { resolveHierarchy, TOKEN_SEPARATOR } from './hierarchy/hierarchy-resolver.js';
export { normalizeLineEndings, stripPageBreaks, normalizeText } from './normalize/page-breaks.js';
export { foldLines } from './normalize/line-folder.js';
export {
  SectionExtractor,
  createPreambleRecord,
  type SectionExtractorOptions,
} from './extractor/section-extractor.js';
export { ChunkBuilder } from './chunker/chunk-builder.js';
export { TokenCounter, type TokenEncoder } from './chunker/token-counter.js';
export { DocumentChunker, type DocumentChunkerOptions } from './pipeline.js';
export { annotateChunks, hasRole, type RoleAnnotator } from './annotator/role-annotator.js';
export {
  KeywordRoleAnnotator,
  roleCatalogSchema,
  roleDefinitionSchema,
  type RoleDefinition,
} from './annotator/keyword-role-annotator.js';
export { extractRoleCatalog } from './annotator/role-catalog-extractor.js';
export { FileDiscovery, type FileDiscoveryOptions } from './discovery/file-discovery.js';
