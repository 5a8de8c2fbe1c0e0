import { loadConfig, type ScanConfig } from "../../core/config.js";
import { runScanPipeline, type ScanResult } from "../../indexer/pipeline.js";
import { setLoggerStderr } from "../../utils/logger.js";

export interface ReportArgs {
  root?: string;
  json?: boolean;
}

export interface ScanSession extends ScanResult {
  config: ScanConfig;
}

/** Load config for the requested root and run a full scan. */
export async function scanForReport(args: ReportArgs): Promise<ScanSession> {
  // stdout is reserved for the JSON document
  if (args.json) setLoggerStderr(true);

  const config = loadConfig(args.root ?? process.cwd());
  const result = await runScanPipeline(config);
  return { config, ...result };
}
