import type { DeclaredName } from "./types.js";

const IDENTIFIER_CHAR = /[\p{L}\p{N}_]/u;

const BINDING_KEYWORDS = ["const", "let", "var"] as const;

/**
 * Read the identifier that follows the first occurrence of `keyword` in `line`.
 * Returns null when the keyword is missing or nothing name-like follows it.
 */
export function extractExportName(line: string, keyword: string): string | null {
  const pos = line.indexOf(keyword);
  if (pos === -1) return null;

  const rest = line.slice(pos + keyword.length).trimStart();
  let name = "";
  for (const ch of rest) {
    if (!IDENTIFIER_CHAR.test(ch)) break;
    name += ch;
  }
  return name.length > 0 ? name : null;
}

/**
 * Line-oriented scan for exported declarations in comment-stripped source.
 *
 * Each test runs independently, so one line may yield several names
 * (`export const typeMap = ...` is both a const and a type `Map`).
 * Declarations whose keyword and name are split across lines are missed.
 */
export function extractDeclarations(strippedSource: string): DeclaredName[] {
  const declarations: DeclaredName[] = [];

  const push = (
    line: string,
    keyword: string,
    kind: DeclaredName["kind"],
  ): void => {
    const name = extractExportName(line, keyword);
    if (name) declarations.push({ name, kind });
  };

  for (const raw of strippedSource.split("\n")) {
    const line = raw.trim();
    if (!line) continue;

    const exported = line.includes("export");

    if (exported && line.includes("class")) push(line, "class", "class");
    if (exported && line.includes("enum")) push(line, "enum", "enum");
    if (exported && line.includes("type") && !line.includes("typeof")) {
      push(line, "type", "type");
    }
    if (exported && line.includes("interface")) {
      push(line, "interface", "interface");
    }
    if (exported && line.includes("function")) {
      push(line, "function", "function");
    }

    const binding = BINDING_KEYWORDS.find((kw) =>
      line.startsWith(`export ${kw}`),
    );
    if (binding) {
      const isFunctionValue =
        line.includes("=>") || line.includes("= function");
      push(line, binding, isFunctionValue ? "function" : "const");
    }
  }

  return declarations;
}
