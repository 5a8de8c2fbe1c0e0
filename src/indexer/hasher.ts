import * as crypto from "node:crypto";

const ID_HEX_LENGTH = 16; // 64 bits

export function hashContent(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/**
 * Stable identity of a symbol: the leading 64 bits of sha256("<file>:<name>").
 * Identical for every importer and every run as long as the path string matches.
 */
export function symbolId(filePath: string, name: string): string {
  return hashContent(`${filePath}:${name}`).slice(0, ID_HEX_LENGTH);
}
