// Model
export type {
  ElementKind,
  ReferenceKind,
  RelationshipKind,
  Visibility,
  RawReference,
  Element,
  SyntaxIssue,
  FileExtraction,
} from "./core/model.js";
export { ELEMENT_KINDS, REFERENCE_KINDS, RELATIONSHIP_KINDS } from "./core/model.js";

export type { LanguageMap } from "./core/languages.js";
export { DEFAULT_LANGUAGE_MAP, LanguageRegistry } from "./core/languages.js";

// Ports
export type { FileSystem } from "./core/ports/FileSystem.js";
export type { LanguageExtractor } from "./core/ports/LanguageExtractor.js";
export type { ProjectScanner, ScanOptions, ScanResult } from "./core/ports/ProjectScanner.js";

// Services
export type { ExtractOptions, FileOutcome, ExtractionBatch } from "./core/services/ExtractionService.js";
export { ExtractionService } from "./core/services/ExtractionService.js";

// Infrastructure
export { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
export {
  NodeProjectScanner,
  DEFAULT_IGNORE_PATTERNS,
  createIgnoreMatcher,
  expandIgnorePattern,
} from "./infrastructure/scanner/NodeProjectScanner.js";
export {
  TreeSitterExtractor,
  SUPPORTED_LANGUAGES,
  contentHash,
} from "./infrastructure/parsers/TreeSitterExtractor.js";
export { moduleNameFor, isPackageIndex } from "./infrastructure/parsers/modulePaths.js";
