import { stripComments } from "../parser/comment-stripper.js";
import { extractDeclarations } from "../parser/declarations.js";
import { extractImports } from "../parser/imports.js";
import type {
  FileParseResult,
  ResolveOptions,
  SymbolRecord,
} from "../parser/types.js";
import { symbolId } from "./hasher.js";

/**
 * Extract the exported symbols and import edges of one file.
 * Every symbol carries the file's full import list as its dependencies.
 */
export function parseSourceFile(
  filePath: string,
  source: string,
  options: ResolveOptions,
): FileParseResult {
  const imports = extractImports(source, filePath, options);
  const stripped = stripComments(source);

  const symbols: SymbolRecord[] = extractDeclarations(stripped).map(
    ({ name, kind }) => ({
      id: symbolId(filePath, name),
      name,
      kind,
      filePath,
      dependencies: [...imports],
      isUsed: isUsedLocally(source, name),
    }),
  );

  return { filePath, symbols, imports };
}

/**
 * True when `name` occurs as a whole word more than once in the raw source:
 * the declaration itself plus at least one other mention, comments included.
 * Shadowing is not detected.
 */
export function isUsedLocally(source: string, name: string): boolean {
  const pattern = new RegExp(
    `(?<![\\p{L}\\p{N}_])${escapeRegex(name)}(?![\\p{L}\\p{N}_])`,
    "gu",
  );
  let count = 0;
  while (pattern.exec(source) !== null) {
    if (++count > 1) return true;
  }
  return false;
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
