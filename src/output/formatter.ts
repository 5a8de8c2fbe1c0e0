import * as path from "node:path";
import type { SymbolRecord } from "../parser/types.js";
import { formatChangeType, type ChangedFile } from "../utils/git.js";

export interface FormatOptions {
  /** Print paths relative to this directory instead of absolute. */
  displayRoot?: string;
}

function displayPath(filePath: string, options: FormatOptions): string {
  if (!options.displayRoot) return filePath;
  const rel = path.relative(options.displayRoot, filePath);
  return rel.startsWith("..") || path.isAbsolute(rel) ? filePath : rel;
}

function formatDependencies(
  symbol: SymbolRecord,
  options: FormatOptions,
): string {
  if (symbol.dependencies.length === 0) return "Deps: none\n";
  let out = `Deps: ${symbol.dependencies.length}\n`;
  for (const dep of symbol.dependencies) {
    out += `  - ${dep.name} (${displayPath(dep.path, options)})\n`;
  }
  return out;
}

/** One symbol as a `---`-terminated block. */
export function formatSymbol(
  symbol: SymbolRecord,
  options: FormatOptions & { withDependencies?: boolean } = {},
): string {
  let out = `ID: ${symbol.id}\n`;
  out += `Name: ${symbol.name}\n`;
  out += `Type: ${symbol.kind}\n`;
  out += `File: ${displayPath(symbol.filePath, options)}\n`;
  out += `Used: ${symbol.isUsed ? "yes" : "no"}\n`;
  if (options.withDependencies) {
    out += formatDependencies(symbol, options);
  }
  return out + "---\n";
}

/** Listing for the `all` report; callers pass records already sorted by id. */
export function formatAllSymbols(
  symbols: SymbolRecord[],
  options: FormatOptions = {},
): string {
  let out = `Found ${symbols.length} symbols:\n\n`;
  for (const symbol of symbols) {
    out += formatSymbol(symbol, { ...options, withDependencies: true });
  }
  out += `\nTotal symbols: ${symbols.length}`;
  return out;
}

export function formatUnusedSymbols(
  unused: SymbolRecord[],
  totalSymbols: number,
  options: FormatOptions = {},
): string {
  let out = `Found ${unused.length} unused symbols:\n\n`;
  for (const symbol of unused) {
    out += `Name: ${symbol.name}\n`;
    out += `Type: ${symbol.kind}\n`;
    out += `File: ${displayPath(symbol.filePath, options)}\n`;
    out += "---\n";
  }
  out += `\nTotal: ${unused.length} unused out of ${totalSymbols} symbols`;
  return out;
}

export function formatChangedFiles(
  changed: ChangedFile[],
  options: FormatOptions = {},
): string {
  return changed
    .map((f) => `${formatChangeType(f.changeType)}\t${displayPath(f.path, options)}`)
    .join("\n");
}

/**
 * Keep symbols defined in files the branch added, modified or renamed.
 * Deleted files contribute nothing.
 */
export function filterByChangedFiles(
  symbols: SymbolRecord[],
  changed: ChangedFile[],
): SymbolRecord[] {
  const paths = new Set(
    changed
      .filter((f) => f.changeType !== "deleted")
      .map((f) => path.resolve(f.path)),
  );
  return symbols.filter((s) => paths.has(path.resolve(s.filePath)));
}
