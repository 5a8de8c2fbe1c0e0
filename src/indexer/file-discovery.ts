import * as fs from "node:fs";
import * as path from "node:path";
import fg from "fast-glob";
import ignore from "ignore";
import type { ScanConfig } from "../core/config.js";
import { getSupportedExtensions } from "../parser/languages.js";
import { logger } from "../utils/logger.js";

export interface DiscoveredFile {
  /** Canonical path with symlinks resolved; the key symbols are declared under. */
  absolutePath: string;
  /** Relative to the project root, forward slashes. */
  relativePath: string;
}

/**
 * Build the exclusion filter: denied directory names at any depth,
 * denied file-name suffixes, and the configured ignore patterns.
 */
export function buildExclusionFilter(
  config: ScanConfig,
): ReturnType<typeof ignore.default> {
  return ignore.default()
    .add(config.excludeDirs.map((dir) => `${dir}/`))
    .add(config.excludeFileSuffixes.map((suffix) => `*${suffix}`))
    .add(config.ignorePatterns);
}

export async function discoverFiles(
  config: ScanConfig,
): Promise<DiscoveredFile[]> {
  const { projectRoot } = config;
  const ig = buildExclusionFilter(config);

  const extensions = getSupportedExtensions();
  const pattern = `**/*{${extensions.join(",")}}`;

  const byPath = new Map<string, DiscoveredFile>();

  for (const subdir of config.include) {
    const fullPath = path.join(projectRoot, subdir);

    if (!isDirectory(fullPath)) {
      logger.warn(`Directory ${fullPath} does not exist, skipping`);
      continue;
    }

    logger.info(`Scanning directory: ${fullPath}`);

    const filePaths = await fg(pattern, {
      cwd: fullPath,
      absolute: false,
      dot: true,
      onlyFiles: true,
      suppressErrors: true,
      ignore: ["**/node_modules/**"],
    });

    let found = 0;
    for (const filePath of filePaths) {
      const relativePath = path.posix.join(toPosix(subdir), filePath);
      if (ig.ignores(relativePath)) continue;

      const absolutePath = fs.realpathSync(path.join(projectRoot, relativePath));
      if (byPath.has(absolutePath)) continue;

      byPath.set(absolutePath, { absolutePath, relativePath });
      found++;
    }

    logger.info(`  Found ${found} TypeScript files`);
  }

  return [...byPath.values()].sort((a, b) =>
    a.relativePath.localeCompare(b.relativePath),
  );
}

function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

function toPosix(p: string): string {
  return p.split(path.sep).join("/").replace(/^\.\/+/, "").replace(/\/+$/, "");
}
