import { formatAllSymbols } from "../../output/formatter.js";
import { scanForReport, type ReportArgs } from "./scan.js";

export async function allCommand(args: ReportArgs): Promise<void> {
  const { config, graph } = await scanForReport(args);
  const symbols = graph.all();

  if (args.json) {
    console.log(JSON.stringify(symbols, null, 2));
  } else {
    console.log(formatAllSymbols(symbols, { displayRoot: config.projectRoot }));
  }
}
