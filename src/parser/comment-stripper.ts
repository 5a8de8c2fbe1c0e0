const QUOTES = new Set(["'", '"', "`"]);

/**
 * Remove `//` and `/* *\/` comments from source text.
 *
 * Single-, double- and backtick-quoted strings are copied through untouched,
 * escapes included, so `"// not a comment"` survives. A line comment stops
 * before its newline; an unterminated block comment runs to end of input.
 */
export function stripComments(source: string): string {
  const out: string[] = [];
  const len = source.length;
  let quote: string | null = null;
  let i = 0;

  while (i < len) {
    const c = source[i];

    if (quote !== null) {
      out.push(c);
      if (c === "\\" && i + 1 < len) {
        out.push(source[i + 1]);
        i += 2;
        continue;
      }
      if (c === quote) quote = null;
      i++;
      continue;
    }

    if (QUOTES.has(c)) {
      quote = c;
      out.push(c);
      i++;
      continue;
    }

    if (c === "/" && i + 1 < len) {
      const next = source[i + 1];
      if (next === "/") {
        const newline = source.indexOf("\n", i + 2);
        i = newline === -1 ? len : newline;
        continue;
      }
      if (next === "*") {
        const end = source.indexOf("*/", i + 2);
        i = end === -1 ? len : end + 2;
        continue;
      }
    }

    out.push(c);
    i++;
  }

  return out.join("");
}
