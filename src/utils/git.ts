import { execFileSync } from "node:child_process";
import * as path from "node:path";
import { GitError, type GitStep } from "../core/errors.js";
import { logger } from "./logger.js";

export type ChangeType = "added" | "modified" | "deleted" | "renamed";

export interface ChangedFile {
  /** Absolute path inside the working tree. */
  path: string;
  changeType: ChangeType;
}

/** Runs git with `args` in `cwd` and returns stdout; throws on non-zero exit. */
export type GitRunner = (args: string[], cwd: string) => string;

const CHANGE_TYPE_LETTERS: Record<ChangeType, string> = {
  added: "A",
  modified: "M",
  deleted: "D",
  renamed: "R",
};

export function formatChangeType(changeType: ChangeType): string {
  return CHANGE_TYPE_LETTERS[changeType];
}

export const execGit: GitRunner = (args, cwd) =>
  execFileSync("git", args, {
    cwd,
    encoding: "utf-8",
    stdio: ["ignore", "pipe", "pipe"],
    maxBuffer: 64 * 1024 * 1024,
  });

/**
 * Files changed on the current branch: the diff between the merge-base of
 * HEAD and `baseRef`, and HEAD itself. Commits that landed on `baseRef`
 * after the branch point are not included.
 */
export function getChangedFiles(
  repoPath: string,
  baseRef: string,
  run: GitRunner = execGit,
): ChangedFile[] {
  const git = (step: GitStep, args: string[], message: string): string => {
    try {
      return run(args, repoPath).trim();
    } catch (err) {
      const cause = err instanceof Error ? err.message.trim() : String(err);
      throw new GitError(step, `${message}: ${cause}`);
    }
  };

  const isBare = git(
    "discover",
    ["rev-parse", "--is-bare-repository"],
    `Failed to find git repository at or above '${repoPath}'`,
  );
  if (isBare === "true") {
    throw new GitError(
      "workdir",
      "Repository has no working directory (bare repository)",
    );
  }

  const workTree = git(
    "workdir",
    ["rev-parse", "--show-toplevel"],
    "Failed to locate the working tree",
  );

  const base = git(
    "resolve-ref",
    ["rev-parse", "--verify", "--quiet", `${baseRef}^{commit}`],
    `Could not resolve git reference '${baseRef}'`,
  );

  const head = git(
    "head",
    ["rev-parse", "--verify", "--quiet", "HEAD^{commit}"],
    "HEAD does not point to a commit",
  );

  const mergeBase = git(
    "merge-base",
    ["merge-base", head, base],
    `Could not find merge-base between HEAD and '${baseRef}'`,
  );

  logger.debug(`Diffing ${mergeBase}..${head} (base ref ${baseRef})`);

  const diff = git(
    "diff",
    ["diff", "--name-status", "-M", "-z", mergeBase, head],
    "Failed to compute diff between merge-base and HEAD",
  );

  return parseNameStatus(diff).map((entry) => ({
    path: path.join(workTree, entry.path),
    changeType: entry.changeType,
  }));
}

/**
 * Parse `git diff --name-status -z` output into repository-relative entries.
 * Copies count as additions; type changes and unmerged entries are skipped.
 */
export function parseNameStatus(output: string): ChangedFile[] {
  const tokens = output.split("\0");
  const entries: ChangedFile[] = [];
  let i = 0;

  while (i < tokens.length) {
    const status = tokens[i++];
    if (!status) continue;

    const letter = status[0];
    if (letter === "R" || letter === "C") {
      i++; // old path
      const newPath = tokens[i++];
      if (newPath) {
        entries.push({
          path: newPath,
          changeType: letter === "R" ? "renamed" : "added",
        });
      }
      continue;
    }

    const filePath = tokens[i++];
    if (!filePath) continue;

    switch (letter) {
      case "A":
        entries.push({ path: filePath, changeType: "added" });
        break;
      case "M":
        entries.push({ path: filePath, changeType: "modified" });
        break;
      case "D":
        entries.push({ path: filePath, changeType: "deleted" });
        break;
    }
  }

  return entries;
}
