import { Command } from "commander";
import { ExportAuditError } from "../core/errors.js";
import { logger, setLogLevel } from "../utils/logger.js";
import { allCommand } from "./commands/all.js";
import { changedCommand } from "./commands/changed.js";
import { initCommand } from "./commands/init.js";
import { queryCommand } from "./commands/query.js";
import { unusedCommand } from "./commands/unused.js";

interface GlobalArgs {
  verbose?: boolean;
  quiet?: boolean;
}

export function createProgram(): Command {
  const program = new Command()
    .name("export-audit")
    .description("Find exported TypeScript symbols that nothing imports")
    .version("0.1.0")
    .option("-v, --verbose", "Log per-file extraction details")
    .option("-q, --quiet", "Only log errors");

  program.hook("preAction", () => {
    const { verbose, quiet } = program.opts<GlobalArgs>();
    if (quiet) setLogLevel("error");
    else if (verbose) setLogLevel("debug");
  });

  program
    .command("all")
    .description("List every symbol found in the tree, sorted by id")
    .option("-r, --root <dir>", "Root of the tree to scan")
    .option("--json", "Output as JSON")
    .action(allCommand);

  program
    .command("query <id>")
    .description("Show one symbol and its dependencies")
    .option("-r, --root <dir>", "Root of the tree to scan")
    .option("--json", "Output as JSON")
    .action(queryCommand);

  program
    .command("unused")
    .description("List exported symbols that are never used, sorted by file")
    .option("-r, --root <dir>", "Root of the tree to scan")
    .option("--json", "Output as JSON")
    .option(
      "-b, --base <ref>",
      "Only report files changed on this branch since <ref>",
    )
    .action(unusedCommand);

  program
    .command("changed <ref>")
    .description("List files changed on this branch since <ref>")
    .option("-r, --root <dir>", "Repository directory")
    .action(changedCommand);

  program
    .command("init")
    .description("Write a default export-audit.json")
    .option("-r, --root <dir>", "Directory to write the config into")
    .option("--force", "Overwrite an existing config file")
    .action(initCommand);

  return program;
}

export async function run(argv: string[]): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (err) {
    if (err instanceof ExportAuditError) {
      logger.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}
