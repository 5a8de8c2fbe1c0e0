import * as fs from "node:fs";
import type { ScanConfig } from "../core/config.js";
import type { ResolveOptions } from "../parser/types.js";
import { logger } from "../utils/logger.js";
import { discoverFiles } from "./file-discovery.js";
import { SymbolGraph } from "./graph-builder.js";
import { parseSourceFile } from "./symbol-extractor.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

export interface ScanResult {
  graph: SymbolGraph;
  filesScanned: number;
  filesFailed: number;
}

/**
 * Parse the given absolute file paths and merge them, in order, into a
 * fresh symbol graph. Files that cannot be read or are not valid UTF-8 are
 * logged and left out.
 */
export function scanFiles(
  filePaths: readonly string[],
  config: ScanConfig,
): ScanResult {
  const graph = new SymbolGraph();
  const options: ResolveOptions = {
    projectRoot: config.projectRoot,
    aliases: config.aliases,
  };
  let filesFailed = 0;

  for (const filePath of filePaths) {
    let source: string;
    try {
      source = utf8.decode(fs.readFileSync(filePath));
    } catch (err) {
      filesFailed++;
      logger.warn(
        `Could not read ${filePath}: ${err instanceof Error ? err.message : err}`,
      );
      continue;
    }

    const result = parseSourceFile(filePath, source, options);
    logger.debug(
      `  ${filePath}: ${result.symbols.length} exports, ${result.imports.length} imports`,
    );
    graph.addFile(result);
  }

  return {
    graph,
    filesScanned: filePaths.length - filesFailed,
    filesFailed,
  };
}

export async function runScanPipeline(config: ScanConfig): Promise<ScanResult> {
  const discovered = await discoverFiles(config);

  if (discovered.length === 0) {
    logger.warn(`No TypeScript files found in ${config.projectRoot}`);
  } else {
    logger.info(`Processing ${discovered.length} TypeScript files...`);
  }

  const result = scanFiles(
    discovered.map((f) => f.absolutePath),
    config,
  );

  if (result.filesFailed > 0) {
    logger.warn(`${result.filesFailed} file(s) could not be read`);
  }

  return result;
}
