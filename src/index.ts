/**
 * vaultweave
 *
 * Turns a folder of markdown notes into a reference-aware vector database:
 * wikilinks and embeds are resolved against the folder, collected into a note
 * graph, and persisted alongside chunk embeddings for retrieval.
 */

export * from "./rag/index.js";
export * from "./graph/index.js";

export { ReferenceParser, parseReferences, type ReferenceParserOptions } from "./references/parser.js";
export { DEFAULT_REFERENCE_PATTERNS, compilePatternTable, type CompiledPattern } from "./references/patterns.js";
export { extractContext, normalizeNoteTitle } from "./references/text.js";
export type { Reference, ReferenceKind, ReferencePatternDefinition, ReferencePosition } from "./references/types.js";

export { PathResolver, normalizeTarget, type PathResolverOptions } from "./resolution/pathResolver.js";
export { FileSnapshot } from "./resolution/snapshot.js";
export type { Resolution, ResolutionError, ResolutionVia } from "./resolution/types.js";

export { CompositeIndex, type CompositeIndexStats } from "./identity/compositeIndex.js";
export { canonicalizePath, imageId, noteId, type ImageId, type NoteId } from "./identity/ids.js";

export {
  ConfigSchema,
  DEFAULT_CONFIG,
  applyEnvOverrides,
  expandPath,
  getConfigPath,
  loadConfig,
  parseConfig,
  resolveOutputPath,
  saveConfig,
  type VaultweaveConfig,
  type VaultweaveConfigInput,
} from "./utils/config.js";
export {
  ArtifactError,
  ConfigError,
  EmbeddingError,
  ErrorCode,
  FileSystemError,
  ValidationError,
  VaultweaveError,
  formatErrorForUser,
  isRecoverableError,
} from "./utils/errors.js";
export { createLogger, getLogger, type LogLevel, type LoggerOptions } from "./utils/logger.js";
export { parseNote, resolveNoteTitle, type ParsedNote } from "./utils/frontmatter.js";
