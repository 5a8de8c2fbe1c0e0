import { symbolId } from "../indexer/hasher.js";
import { stripComments } from "./comment-stripper.js";
import { resolveImportPath } from "./resolver.js";
import type { ImportEdge, ResolveOptions } from "./types.js";

const IMPORT_GROUP_RE = /import\s*\{([^}]*)\}\s*from/g;
const NAMED_IMPORT_RE = /import\s*\{([^}]+)\}\s*from\s*['"]([^'"]+)['"]/g;
const DEFAULT_IMPORT_RE =
  /import\s+([\p{L}\p{N}_]+)\s+from\s*['"]([^'"]+)['"]/gu;
const LAZY_IMPORT_RE =
  /import\s*\(\s*['"]([^'"]+)['"]\s*\)\.then\s*\(\s*[\p{L}\p{N}_]+\s*=>\s*[\p{L}\p{N}_]+\.([\p{L}\p{N}_]+)\s*\)/gu;

const REJECTED_DEFAULT_NAMES = new Set(["type", "from"]);

/** Collapse each `import { ... } from` group onto a single line. */
export function normalizeImportGroups(source: string): string {
  return source.replace(
    IMPORT_GROUP_RE,
    (_match, names: string) => `import {${names.replace(/[\r\n]/g, " ")}} from`,
  );
}

/** Names listed in a named-import group, aliases reduced to the exported name. */
export function parseImportNames(group: string): string[] {
  const names: string[] = [];
  for (const part of group.split(",")) {
    const entry = part.trim();
    if (!entry) continue;

    const aliasAt = entry.indexOf(" as ");
    names.push(aliasAt === -1 ? entry : entry.slice(0, aliasAt).trim());
  }
  return names;
}

/**
 * Extract import edges from raw source text.
 *
 * Named imports come first, then default imports, then lazy
 * `import("...").then(m => m.Name)` loads. Edges whose specifier is a bare
 * package name are dropped.
 */
export function extractImports(
  source: string,
  filePath: string,
  options: ResolveOptions,
): ImportEdge[] {
  const normalized = normalizeImportGroups(stripComments(source));
  const edges: ImportEdge[] = [];

  const addEdges = (names: string[], specifier: string): void => {
    const resolved = resolveImportPath(filePath, specifier, options);
    if (resolved === null) return;
    for (const name of names) {
      edges.push({ id: symbolId(resolved, name), name, path: resolved });
    }
  };

  for (const [, group, specifier] of normalized.matchAll(NAMED_IMPORT_RE)) {
    addEdges(parseImportNames(group), specifier);
  }

  for (const [, name, specifier] of normalized.matchAll(DEFAULT_IMPORT_RE)) {
    if (REJECTED_DEFAULT_NAMES.has(name)) continue;
    addEdges([name], specifier);
  }

  for (const [, specifier, member] of normalized.matchAll(LAZY_IMPORT_RE)) {
    addEdges([member], specifier);
  }

  return edges;
}
