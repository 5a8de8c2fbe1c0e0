import * as path from "node:path";
import { formatChangedFiles } from "../../output/formatter.js";
import { getChangedFiles } from "../../utils/git.js";
import { logger } from "../../utils/logger.js";

interface ChangedArgs {
  root?: string;
}

export async function changedCommand(
  baseRef: string,
  args: ChangedArgs,
): Promise<void> {
  const root = path.resolve(args.root ?? process.cwd());
  const changed = getChangedFiles(root, baseRef);

  if (changed.length === 0) {
    logger.info(`No files changed since ${baseRef}`);
    return;
  }

  console.log(formatChangedFiles(changed, { displayRoot: root }));
}
