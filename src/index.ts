export { CodeChunker, chunkId, withPathHeader } from './core/chunker.js';
export type { CodeChunkerOptions, ChunkerStats } from './core/chunker.js';
export { buildSizeTiers, selectSizeTier } from './core/size-tier.js';
export type { SizeTier, SizeTierName } from './core/size-tier.js';
export { detectLanguage, isHiddenPath, toFileRecord } from './core/file-record.js';
export { fileCategory, CODE_CATEGORY } from './core/file-category.js';
export { MethodSplitter } from './splitter/method-splitter.js';
export { findMatchingBrace } from './splitter/brace-matcher.js';
export {
  findDeclarationStart,
  findFirstMemberStart,
  findNextMember,
  countMemberSignatures,
} from './splitter/structural-boundaries.js';
export type { MemberMatch } from './splitter/structural-boundaries.js';
export { extractSymbolContext, resolveLanguageFamily } from './splitter/symbol-extract.js';
export type { SymbolContext, LanguageFamily } from './splitter/symbol-extract.js';
export { RecursiveSplitter, separatorLanguage, separatorLanguages } from './splitter/recursive.js';
export type {
  Chunk,
  ChunkMetadata,
  FileRecord,
  GenericSplitOptions,
  GenericSplitter,
} from './splitter/types.js';
export { getConfig, loadConfig, parseConfig, DEFAULT_CHUNKER_CONFIG } from './config.js';
export type { ChunkerConfig } from './config.js';
export { ChunkerError, ConfigError, ChunkingError } from './errors.js';
