import type {
  FileParseResult,
  ImportEdge,
  SymbolRecord,
} from "../parser/types.js";

/**
 * Global symbol mapping for one scan, keyed by symbol id.
 *
 * Files may arrive in any order. An import seen before its target file
 * creates an "unknown" placeholder that the declaration later promotes;
 * `isUsed` is only ever OR-ed, never cleared.
 */
export class SymbolGraph {
  private readonly symbols = new Map<string, SymbolRecord>();

  get size(): number {
    return this.symbols.size;
  }

  get(id: string): SymbolRecord | undefined {
    return this.symbols.get(id);
  }

  addFile(result: FileParseResult): void {
    for (const edge of result.imports) {
      this.markImported(edge);
    }
    for (const symbol of result.symbols) {
      this.declare(symbol);
    }
  }

  /** Every record, sorted by id. */
  all(): SymbolRecord[] {
    return [...this.symbols.values()].sort((a, b) => compare(a.id, b.id));
  }

  /** Declared symbols nothing uses, sorted by file then name. */
  unused(): SymbolRecord[] {
    return [...this.symbols.values()]
      .filter((s) => !s.isUsed && s.kind !== "unknown")
      .sort(
        (a, b) => compare(a.filePath, b.filePath) || compare(a.name, b.name),
      );
  }

  toMap(): ReadonlyMap<string, SymbolRecord> {
    return this.symbols;
  }

  private markImported(edge: ImportEdge): void {
    const existing = this.symbols.get(edge.id);
    if (existing) {
      existing.isUsed = true;
      return;
    }
    this.symbols.set(edge.id, {
      id: edge.id,
      name: edge.name,
      kind: "unknown",
      filePath: edge.path,
      dependencies: [],
      isUsed: true,
    });
  }

  private declare(symbol: SymbolRecord): void {
    const existing = this.symbols.get(symbol.id);
    if (existing) {
      existing.kind = symbol.kind;
      existing.dependencies = symbol.dependencies;
      existing.isUsed = existing.isUsed || symbol.isUsed;
      return;
    }
    this.symbols.set(symbol.id, { ...symbol });
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
