import {
  filterByChangedFiles,
  formatUnusedSymbols,
} from "../../output/formatter.js";
import { getChangedFiles } from "../../utils/git.js";
import { logger } from "../../utils/logger.js";
import { scanForReport, type ReportArgs } from "./scan.js";

interface UnusedArgs extends ReportArgs {
  base?: string;
}

export async function unusedCommand(args: UnusedArgs): Promise<void> {
  const { config, graph } = await scanForReport(args);
  let unused = graph.unused();

  if (args.base) {
    const changed = getChangedFiles(config.projectRoot, args.base);
    logger.info(
      `Limiting report to ${changed.length} files changed since ${args.base}`,
    );
    unused = filterByChangedFiles(unused, changed);
  }

  if (args.json) {
    console.log(JSON.stringify(unused, null, 2));
  } else {
    console.log(
      formatUnusedSymbols(unused, graph.size, {
        displayRoot: config.projectRoot,
      }),
    );
  }
}
