import { describe, it, expect, vi } from "vitest";
import { GitError } from "../../src/core/errors.js";
import {
  formatChangeType,
  getChangedFiles,
  parseNameStatus,
  type GitRunner,
} from "../../src/utils/git.js";

const DIFF =
  "M\0src/a.ts\0A\0src/new.ts\0D\0src/old.ts\0R087\0src/from.ts\0src/to.ts\0C100\0src/x.ts\0src/copy.ts\0T\0src/link.ts\0";

function fakeGit(overrides: Record<string, string | Error> = {}): GitRunner {
  const responses: Record<string, string | Error> = {
    "rev-parse --is-bare-repository": "false\n",
    "rev-parse --show-toplevel": "/repo\n",
    "rev-parse --verify --quiet main^{commit}": "b4se\n",
    "rev-parse --verify --quiet HEAD^{commit}": "he4d\n",
    "merge-base he4d b4se": "f0rk\n",
    "diff --name-status -M -z f0rk he4d": DIFF,
    ...overrides,
  };
  return (args) => {
    const response = responses[args.join(" ")];
    if (response === undefined) {
      throw new Error(`unexpected git ${args.join(" ")}`);
    }
    if (response instanceof Error) throw response;
    return response;
  };
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}

describe("formatChangeType", () => {
  it("renders one-letter codes", () => {
    expect(formatChangeType("added")).toBe("A");
    expect(formatChangeType("modified")).toBe("M");
    expect(formatChangeType("deleted")).toBe("D");
    expect(formatChangeType("renamed")).toBe("R");
  });
});

describe("parseNameStatus", () => {
  it("maps statuses and keeps the new path of renames", () => {
    expect(parseNameStatus(DIFF)).toEqual([
      { path: "src/a.ts", changeType: "modified" },
      { path: "src/new.ts", changeType: "added" },
      { path: "src/old.ts", changeType: "deleted" },
      { path: "src/to.ts", changeType: "renamed" },
      { path: "src/copy.ts", changeType: "added" },
    ]);
  });

  it("returns nothing for an empty diff", () => {
    expect(parseNameStatus("")).toEqual([]);
  });
});

describe("getChangedFiles", () => {
  it("diffs the merge-base against HEAD and returns absolute paths", () => {
    const run = vi.fn(fakeGit());
    const changed = getChangedFiles("/repo/apps", "main", run);

    expect(run).toHaveBeenCalledWith(
      ["diff", "--name-status", "-M", "-z", "f0rk", "he4d"],
      "/repo/apps",
    );
    expect(changed).toEqual([
      { path: "/repo/src/a.ts", changeType: "modified" },
      { path: "/repo/src/new.ts", changeType: "added" },
      { path: "/repo/src/old.ts", changeType: "deleted" },
      { path: "/repo/src/to.ts", changeType: "renamed" },
      { path: "/repo/src/copy.ts", changeType: "added" },
    ]);
  });

  it("reports a directory outside any repository", () => {
    const run = fakeGit({
      "rev-parse --is-bare-repository": new Error("fatal: not a git repository"),
    });
    expect(thrownBy(() => getChangedFiles("/tmp/x", "main", run))).toMatchObject({
      step: "discover",
      message:
        "Failed to find git repository at or above '/tmp/x': fatal: not a git repository",
    });
  });

  it("rejects bare repositories", () => {
    const run = fakeGit({ "rev-parse --is-bare-repository": "true\n" });
    expect(thrownBy(() => getChangedFiles("/repo", "main", run))).toMatchObject({
      step: "workdir",
      message: "Repository has no working directory (bare repository)",
    });
  });

  it("reports a reference that does not resolve", () => {
    const err = thrownBy(() => getChangedFiles("/repo", "nope", fakeGit()));
    expect(err).toBeInstanceOf(GitError);
    expect(err).toMatchObject({
      step: "resolve-ref",
      message:
        "Could not resolve git reference 'nope': unexpected git rev-parse --verify --quiet nope^{commit}",
    });
  });

  it("reports branches without common history", () => {
    const run = fakeGit({ "merge-base he4d b4se": new Error("exit code 1") });
    expect(thrownBy(() => getChangedFiles("/repo", "main", run))).toMatchObject({
      step: "merge-base",
    });
  });

  it("reports a failing diff", () => {
    const run = fakeGit({
      "diff --name-status -M -z f0rk he4d": new Error("bad object"),
    });
    expect(thrownBy(() => getChangedFiles("/repo", "main", run))).toMatchObject({
      step: "diff",
      message: "Failed to compute diff between merge-base and HEAD: bad object",
    });
  });
});
