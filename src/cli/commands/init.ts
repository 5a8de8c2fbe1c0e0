import * as path from "node:path";
import { initConfig } from "../../core/config.js";
import { AlreadyInitializedError } from "../../core/errors.js";
import { logger } from "../../utils/logger.js";

interface InitArgs {
  root?: string;
  force?: boolean;
}

export async function initCommand(args: InitArgs): Promise<void> {
  const root = path.resolve(args.root ?? process.cwd());

  let configPath: string;
  try {
    configPath = initConfig(root, { force: args.force });
  } catch (err) {
    if (err instanceof AlreadyInitializedError) {
      logger.error(err.message);
      logger.info("Use --force to overwrite it.");
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  logger.info(`Wrote ${path.relative(process.cwd(), configPath) || configPath}`);
  logger.info("");
  logger.info("Next steps:");
  logger.info("  1. Adjust 'include' and 'aliases' to match your workspace");
  logger.info("  2. Run 'export-audit unused' to list dead exports");
}
