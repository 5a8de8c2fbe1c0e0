import { SymbolNotFoundError } from "../../core/errors.js";
import { formatSymbol } from "../../output/formatter.js";
import { scanForReport, type ReportArgs } from "./scan.js";

export async function queryCommand(
  id: string,
  args: ReportArgs,
): Promise<void> {
  const { config, graph } = await scanForReport(args);
  const symbol = graph.get(id.trim().toLowerCase());

  if (!symbol) {
    throw new SymbolNotFoundError(id);
  }

  if (args.json) {
    console.log(JSON.stringify(symbol, null, 2));
  } else {
    console.log(
      formatSymbol(symbol, {
        displayRoot: config.projectRoot,
        withDependencies: true,
      }).trimEnd(),
    );
  }
}
