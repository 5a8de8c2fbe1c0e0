export { loadConfig, defaultConfig, initConfig } from "./core/config.js";
export type { ScanConfig } from "./core/config.js";
export * from "./core/errors.js";
export { stripComments } from "./parser/comment-stripper.js";
export { extractDeclarations, extractExportName } from "./parser/declarations.js";
export {
  extractImports,
  normalizeImportGroups,
  parseImportNames,
} from "./parser/imports.js";
export { resolveImportPath } from "./parser/resolver.js";
export type * from "./parser/types.js";
export { symbolId } from "./indexer/hasher.js";
export { discoverFiles, type DiscoveredFile } from "./indexer/file-discovery.js";
export { SymbolGraph } from "./indexer/graph-builder.js";
export { parseSourceFile, isUsedLocally } from "./indexer/symbol-extractor.js";
export { runScanPipeline, scanFiles, type ScanResult } from "./indexer/pipeline.js";
export {
  getChangedFiles,
  parseNameStatus,
  formatChangeType,
  type ChangedFile,
  type ChangeType,
  type GitRunner,
} from "./utils/git.js";
export * from "./output/formatter.js";
