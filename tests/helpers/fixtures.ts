import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Write `files` (relative path -> content) under a fresh temporary directory
 * and return its canonical path.
 */
export function makeTree(files: Record<string, string>): string {
  const root = fs.realpathSync(
    fs.mkdtempSync(path.join(os.tmpdir(), "export-audit-")),
  );
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, "utf-8");
  }
  return root;
}

export function removeTree(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}
