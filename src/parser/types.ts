/**
 * Shared types for symbols and import edges extracted from TypeScript sources.
 */
export type SymbolKind =
  | "unknown"
  | "class"
  | "enum"
  | "type"
  | "interface"
  | "function"
  | "const";

/** A declaration name found on one line, before identity is attached. */
export interface DeclaredName {
  name: string;
  kind: Exclude<SymbolKind, "unknown">;
}

/** One imported name plus the file it resolved to. */
export interface ImportEdge {
  id: string;
  name: string;
  path: string;
}

export interface SymbolRecord {
  id: string;
  name: string;
  kind: SymbolKind;
  /** Declaring file, or for placeholders the path the importer resolved to. */
  filePath: string;
  dependencies: ImportEdge[];
  isUsed: boolean;
}

export interface FileParseResult {
  filePath: string;
  symbols: SymbolRecord[];
  imports: ImportEdge[];
}

export interface ResolveOptions {
  projectRoot: string;
  aliases: Record<string, string>;
}
