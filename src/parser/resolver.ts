import * as fs from "node:fs";
import * as path from "node:path";
import type { ResolveOptions } from "./types.js";

const FILE_EXTENSIONS = [".ts", ".tsx"];
const INDEX_FILES = ["index.ts", "index.tsx"];

/**
 * Map an import specifier to the file it refers to.
 *
 * Returns null for bare package specifiers. Internal specifiers always yield
 * a path: the first existing candidate (canonicalized), otherwise the joined
 * path with `.ts` appended so every importer of the same target agrees on it.
 */
export function resolveImportPath(
  importingFile: string,
  specifier: string,
  options: ResolveOptions,
): string | null {
  const basePath = toBasePath(importingFile, specifier, options);
  if (basePath === null) return null;

  const found = findExisting(basePath);
  if (found) return found;

  // ESM-style imports name the emitted file: "./foo.js" -> foo.ts
  const stripped = stripJsExtension(basePath);
  if (stripped !== null) {
    return findExisting(stripped) ?? withTsExtension(stripped);
  }

  return withTsExtension(basePath);
}

function toBasePath(
  importingFile: string,
  specifier: string,
  options: ResolveOptions,
): string | null {
  for (const [prefix, target] of Object.entries(options.aliases)) {
    if (specifier.startsWith(prefix)) {
      return path.join(
        options.projectRoot,
        target,
        specifier.slice(prefix.length),
      );
    }
  }

  if (specifier.startsWith("./") || specifier.startsWith("../")) {
    return path.join(path.dirname(importingFile), specifier);
  }

  return null;
}

function findExisting(basePath: string): string | null {
  const candidates = [
    ...FILE_EXTENSIONS.map((ext) => basePath + ext),
    ...INDEX_FILES.map((file) => path.join(basePath, file)),
  ];

  for (const candidate of candidates) {
    if (isFile(candidate)) return canonicalize(candidate);
  }

  if (isFile(basePath)) return canonicalize(basePath);

  return null;
}

function isFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

function canonicalize(filePath: string): string {
  try {
    return fs.realpathSync(filePath);
  } catch {
    return filePath;
  }
}

function stripJsExtension(basePath: string): string | null {
  const match = /\.jsx?$/.exec(basePath);
  return match ? basePath.slice(0, match.index) : null;
}

function withTsExtension(basePath: string): string {
  return basePath.endsWith(".ts") || basePath.endsWith(".tsx")
    ? basePath
    : `${basePath}.ts`;
}
