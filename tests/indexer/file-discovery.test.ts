import * as fs from "node:fs";
import * as path from "node:path";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { defaultConfig, type ScanConfig } from "../../src/core/config.js";
import {
  buildExclusionFilter,
  discoverFiles,
} from "../../src/indexer/file-discovery.js";
import { setLogLevel } from "../../src/utils/logger.js";
import { makeTree, removeTree } from "../helpers/fixtures.js";

describe("buildExclusionFilter", () => {
  const ig = buildExclusionFilter(defaultConfig("/repo"));

  it("excludes denied directories at any depth", () => {
    expect(ig.ignores("libs/ui/__mocks__/button.ts")).toBe(true);
    expect(ig.ignores("apps/web/src/environments/env.ts")).toBe(true);
    expect(ig.ignores("apps/web/src/tests/setup.ts")).toBe(true);
  });

  it("excludes denied file suffixes", () => {
    expect(ig.ignores("libs/ui/button.spec.ts")).toBe(true);
    expect(ig.ignores("libs/ui/global.d.ts")).toBe(true);
    expect(ig.ignores("libs/ui/button.stories.ts")).toBe(true);
    expect(ig.ignores("libs/ui/http-stub.ts")).toBe(true);
    expect(ig.ignores("libs/ui/user.mocks.ts")).toBe(true);
    expect(ig.ignores("libs/ui/usermock.ts")).toBe(true);
  });

  it("keeps ordinary sources", () => {
    expect(ig.ignores("libs/ui/button.ts")).toBe(false);
    expect(ig.ignores("libs/ui/button.component.tsx")).toBe(false);
    expect(ig.ignores("libs/ui/build/out.ts")).toBe(false);
    expect(ig.ignores("libs/ui/dist/out.ts")).toBe(false);
  });

  it("excludes node_modules at any depth", () => {
    expect(ig.ignores("libs/node_modules/pkg/index.ts")).toBe(true);
  });
});

describe("discoverFiles", () => {
  let root: string;
  let config: ScanConfig;

  beforeAll(() => {
    setLogLevel("silent");
    root = makeTree({
      "apps/web/src/app.ts": "export const app = 1;",
      "apps/web/src/app.spec.ts": "",
      "apps/web/src/__mocks__/m.ts": "",
      "apps/web/src/environments/env.ts": "",
      "apps/web/src/i18n/en.ts": "",
      "libs/ui/button.tsx": "",
      "libs/ui/button.stories.ts": "",
      "libs/ui/thing-stub.ts": "",
      "libs/ui/usermock.ts": "",
      "libs/ui/index.d.ts": "",
      "libs/ui/readme.md": "",
      "libs/ui/build/out.ts": "",
      "libs/node_modules/pkg/index.ts": "",
      "tools/script.ts": "",
      "gen/.cache/out.ts": "",
      "shared/real/util.ts": "",
    });
    fs.symlinkSync(
      path.join(root, "shared/real"),
      path.join(root, "linked"),
      "dir",
    );
    config = defaultConfig(root);
  });

  afterAll(() => {
    removeTree(root);
    setLogLevel("info");
  });

  it("returns only candidate sources under the include roots", async () => {
    const files = await discoverFiles(config);
    expect(files.map((f) => f.relativePath)).toEqual([
      "apps/web/src/app.ts",
      "libs/ui/build/out.ts",
      "libs/ui/button.tsx",
    ]);
    expect(files[0].absolutePath).toBe(`${root}/apps/web/src/app.ts`);
  });

  it("skips include roots that do not exist", async () => {
    const files = await discoverFiles({ ...config, include: ["missing", "tools"] });
    expect(files.map((f) => f.relativePath)).toEqual(["tools/script.ts"]);
  });

  it("lists a file once when include roots overlap", async () => {
    const files = await discoverFiles({ ...config, include: ["libs", "libs/ui"] });
    expect(files.map((f) => f.relativePath)).toEqual([
      "libs/ui/build/out.ts",
      "libs/ui/button.tsx",
    ]);
  });

  it("descends into dot-directories", async () => {
    const files = await discoverFiles({ ...config, include: ["gen"] });
    expect(files.map((f) => f.relativePath)).toEqual(["gen/.cache/out.ts"]);
  });

  it("reports files reached through a symlink under their canonical path", async () => {
    const files = await discoverFiles({ ...config, include: ["linked"] });
    expect(files).toEqual([
      {
        absolutePath: path.join(root, "shared/real/util.ts"),
        relativePath: "linked/util.ts",
      },
    ]);
  });

  it("lists a file once when two include roots reach it", async () => {
    const files = await discoverFiles({
      ...config,
      include: ["shared", "linked"],
    });
    expect(files).toEqual([
      {
        absolutePath: path.join(root, "shared/real/util.ts"),
        relativePath: "shared/real/util.ts",
      },
    ]);
  });
});
